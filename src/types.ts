export type Axis = 'ambiguity' | 'assumption';

export type AmbiguityCategory =
  | 'Subjective term'
  | 'Weak modality'
  | 'Undefined reference'
  | 'Non-testable statement';

export type AssumptionCategory =
  | 'Environment assumption'
  | 'Data assumption'
  | 'State assumption';

export type Category = AmbiguityCategory | AssumptionCategory;

export const CATEGORY_AXIS: Readonly<Record<Category, Axis>> = {
  'Subjective term': 'ambiguity',
  'Weak modality': 'ambiguity',
  'Undefined reference': 'ambiguity',
  'Non-testable statement': 'ambiguity',
  'Environment assumption': 'assumption',
  'Data assumption': 'assumption',
  'State assumption': 'assumption'
};

export type CoarsePos =
  | 'NOUN' | 'PROPN' | 'VERB' | 'AUX' | 'ADJ' | 'ADV' | 'PRON'
  | 'DET' | 'ADP' | 'CCONJ' | 'NUM' | 'PART' | 'PUNCT' | 'X';

export interface AnnotatedToken {
  readonly text: string;
  readonly lemma: string;
  readonly pos: CoarsePos;
  readonly sentence: number;
  readonly start: number; // inclusive
  readonly end: number;   // exclusive
}

export interface AnnotatedText {
  readonly text: string;
  readonly tokens: readonly AnnotatedToken[];
}

export type CompiledTrigger =
  | { readonly kind: 'literal'; readonly phrases: readonly (readonly string[])[] }
  | { readonly kind: 'lemma'; readonly phrases: readonly (readonly string[])[] }
  | { readonly kind: 'regex'; readonly pattern: RegExp };

export type SatisfierScope = 'preceding' | 'sentence' | 'text';

export interface PatternRule {
  readonly id: string;
  readonly category: Category;
  readonly axis: Axis;
  readonly trigger: CompiledTrigger;
  readonly weight: number;
  readonly message: string;
  readonly impact?: string;
  readonly questions: Readonly<Record<string, string>>;
  readonly suppressWhen?: 'quantified' | 'antecedent';
  readonly satisfiedBy?: { readonly trigger: CompiledTrigger; readonly scope: SatisfierScope };
}

export interface StatementType {
  readonly type: string;
  readonly keywords: readonly string[]; // lemmas
}

export interface PatternCatalog {
  readonly version: string;
  readonly rules: readonly PatternRule[];
  readonly quantifier: RegExp;
  readonly statementTypes: readonly StatementType[];
  rulesFor(axis: Axis): readonly PatternRule[];
}

export interface Finding {
  readonly ruleId: string;
  readonly category: Category;
  readonly axis: Axis;
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly sentence: number;
  readonly message: string;
  readonly weight: number;
  readonly impact?: string;
}

export type ReadinessLevel = 'Ready' | 'NeedsClarification' | 'HighRisk';

export const READINESS_LABELS: Readonly<Record<ReadinessLevel, string>> = {
  Ready: 'Ready for automation',
  NeedsClarification: 'Needs clarification',
  HighRisk: 'High risk for automation'
};

/** How far the ambiguity score can be trusted given the amount of text and signal. */
export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export interface CategoryBreakdown {
  category: Category;
  count: number;
  weight: number;
}

export interface ScoreResult {
  readonly ambiguityScore: number;
  readonly assumptionScore: number;
  readonly readinessScore: number;
  readonly readinessLevel: ReadinessLevel;
  readonly breakdown: readonly CategoryBreakdown[];
}

export interface AnalysisResult extends ScoreResult {
  readonly findings: readonly Finding[];
  readonly ambiguityConfidence: Confidence;
  readonly suggestions: readonly string[];
  readonly statementType: string;
  readonly catalogVersion: string;
}

export interface ReportIssue {
  type: Category;
  text: string;
  message: string;
  axis: Axis;
  start: number;
  end: number;
  weight: number;
  impact?: string;
}

export interface AnalysisReport {
  ambiguity_score: number;
  ambiguity_confidence: Confidence;
  assumption_score: number;
  readiness_score: number;
  readiness_level: string;
  issues: ReportIssue[];
  suggestions: string[];
  statement_type: string;
  catalog_version: string;
}

import { CatalogHandle } from '../catalog/catalogHandle';
import { CFG } from '../config';
import { AnnotatorError } from '../errors';
import { NaturalAnnotator, type Annotator } from '../nlp/annotator';
import {
  READINESS_LABELS,
  type AnalysisReport,
  type AnalysisResult,
  type AnnotatedText,
  type PatternCatalog
} from '../types';
import { createLogger } from '../util/logger';
import { detectAmbiguities } from './ambiguity';
import { detectAssumptions } from './assumption';
import { classifyStatement, GENERAL_STATEMENT } from './classify';
import { orderFindings } from './findings';
import { ambiguityConfidence, scoreFindings, wordCount } from './scorer';
import { suggest } from './suggest';

const logger = createLogger('Analyzer');

export interface AnalyzerOptions {
  catalog: CatalogHandle;
  annotator?: Annotator;
  maxSuggestions?: number;
}

function emptyResult(catalog: PatternCatalog): AnalysisResult {
  return Object.freeze({
    ...scoreFindings([]),
    findings: Object.freeze([]),
    ambiguityConfidence: 'LOW' as const,
    suggestions: Object.freeze([]),
    statementType: GENERAL_STATEMENT,
    catalogVersion: catalog.version
  });
}

/**
 * Runs annotate -> detect -> score -> suggest for one text. The catalog
 * snapshot is read once at the start and used for every stage, so a reload
 * during the call cannot mix old and new rules.
 */
export class RequirementAnalyzer {
  private readonly handle: CatalogHandle;
  private readonly annotator: Annotator;
  private readonly maxSuggestions: number;

  constructor(options: AnalyzerOptions) {
    this.handle = options.catalog;
    this.annotator = options.annotator ?? new NaturalAnnotator();
    this.maxSuggestions = options.maxSuggestions ?? 0;
  }

  analyze(text: unknown): AnalysisResult {
    const catalog = this.handle.current();
    if (typeof text !== 'string' || text.trim() === '') {
      return emptyResult(catalog);
    }

    let doc: AnnotatedText;
    try {
      doc = this.annotator.annotate(text);
    } catch (error) {
      if (error instanceof AnnotatorError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new AnnotatorError(`Annotator failed: ${reason}`, { cause: error });
    }

    const findings = orderFindings([
      ...detectAmbiguities(doc, catalog),
      ...detectAssumptions(doc, catalog)
    ]);
    const result: AnalysisResult = Object.freeze({
      ...scoreFindings(findings),
      findings: Object.freeze(findings),
      ambiguityConfidence: ambiguityConfidence(wordCount(text), findings),
      suggestions: Object.freeze(suggest(findings, catalog, this.maxSuggestions)),
      statementType: classifyStatement(doc, catalog),
      catalogVersion: catalog.version
    });

    logger.debug(`${findings.length} findings, readiness ${result.readinessScore} (${result.readinessLevel})`);
    return result;
  }

  /** Pointwise, order-preserving `analyze`. */
  analyzeMany(texts: readonly unknown[]): AnalysisResult[] {
    return texts.map(text => this.analyze(text));
  }
}

export function createAnalyzer(overrides: Partial<AnalyzerOptions> = {}): RequirementAnalyzer {
  return new RequirementAnalyzer({
    catalog: overrides.catalog ?? CatalogHandle.fromFile(CFG.CATALOG_PATH),
    annotator: overrides.annotator,
    maxSuggestions: overrides.maxSuggestions ?? CFG.MAX_SUGGESTIONS
  });
}

export function toReport(result: AnalysisResult): AnalysisReport {
  return {
    ambiguity_score: result.ambiguityScore,
    ambiguity_confidence: result.ambiguityConfidence,
    assumption_score: result.assumptionScore,
    readiness_score: result.readinessScore,
    readiness_level: READINESS_LABELS[result.readinessLevel],
    issues: result.findings.map(f => ({
      type: f.category,
      text: f.text,
      message: f.message,
      axis: f.axis,
      start: f.start,
      end: f.end,
      weight: f.weight,
      ...(f.impact ? { impact: f.impact } : {})
    })),
    suggestions: [...result.suggestions],
    statement_type: result.statementType,
    catalog_version: result.catalogVersion
  };
}

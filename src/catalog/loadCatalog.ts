import fs from 'node:fs';
import type { ZodIssue } from 'zod';
import { CatalogError } from '../errors';
import { lemmaOf, splitPhrase } from '../nlp/lemma';
import { CatalogFileSchema, type RuleSpec, type TriggerSpec } from '../schemas/catalog';
import { CATEGORY_AXIS, type Axis, type CompiledTrigger, type PatternCatalog, type PatternRule } from '../types';

function ruleRef(raw: unknown, index: number): string {
  if (raw && typeof raw === 'object' && 'rules' in raw && Array.isArray(raw.rules)) {
    const rule: unknown = raw.rules[index];
    if (rule && typeof rule === 'object' && 'id' in rule && typeof rule.id === 'string') {
      return `rule "${rule.id}"`;
    }
  }
  return `rule #${index}`;
}

function describeIssue(raw: unknown, issue: ZodIssue): { ref?: string; text: string } {
  const [head, index, ...rest] = issue.path;
  if (head === 'rules' && typeof index === 'number') {
    const ref = ruleRef(raw, index);
    const field = rest.length ? rest.join('.') : 'rule';
    return { ref, text: `${ref}: ${field}: ${issue.message}` };
  }
  return { text: `${issue.path.join('.') || 'catalog'}: ${issue.message}` };
}

function compileRegex(pattern: string, flags: string, ref: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`${ref}: invalid regular expression /${pattern}/: ${reason}`, ref, { cause: error });
  }
}

function compileTrigger(spec: TriggerSpec, ref: string): CompiledTrigger {
  switch (spec.type) {
    case 'literal':
      return Object.freeze({ kind: 'literal' as const, phrases: Object.freeze(spec.phrases.map(p => Object.freeze(splitPhrase(p)))) });
    case 'lemma':
      return Object.freeze({ kind: 'lemma' as const, phrases: Object.freeze(spec.phrases.map(p => Object.freeze(splitPhrase(p).map(lemmaOf)))) });
    case 'regex': {
      // matchAll needs the global flag; it clones the expression per call
      const flags = Array.from(new Set(`${spec.flags ?? 'i'}g`)).join('');
      return Object.freeze({ kind: 'regex' as const, pattern: compileRegex(spec.pattern, flags, ref) });
    }
  }
}

function compileRule(spec: RuleSpec): PatternRule {
  const ref = `rule "${spec.id}"`;
  const axis = CATEGORY_AXIS[spec.category];

  if (spec.suppressWhen && axis !== 'ambiguity') {
    throw new CatalogError(`${ref}: suppressWhen applies to ambiguity categories only (got "${spec.category}")`, ref);
  }
  if (spec.satisfiedBy && axis !== 'assumption') {
    throw new CatalogError(`${ref}: satisfiedBy applies to assumption categories only (got "${spec.category}")`, ref);
  }

  const questions: Record<string, string> = {};
  for (const [key, template] of Object.entries(spec.questions)) {
    questions[key.toLowerCase()] = template;
  }

  return Object.freeze({
    id: spec.id,
    category: spec.category,
    axis,
    trigger: compileTrigger(spec.trigger, ref),
    weight: spec.weight,
    message: spec.message,
    impact: spec.impact,
    questions: Object.freeze(questions),
    suppressWhen: spec.suppressWhen,
    satisfiedBy: spec.satisfiedBy
      ? Object.freeze({ trigger: compileTrigger(spec.satisfiedBy.trigger, `${ref} satisfiedBy`), scope: spec.satisfiedBy.scope })
      : undefined
  });
}

/**
 * Validates and compiles a raw catalog object into an immutable snapshot.
 * Any malformed rule rejects the whole catalog.
 */
export function loadCatalog(raw: unknown): PatternCatalog {
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const first = describeIssue(raw, parsed.error.issues[0]);
    const more = parsed.error.issues.length > 1 ? ` (+${parsed.error.issues.length - 1} more)` : '';
    throw new CatalogError(`Invalid pattern catalog: ${first.text}${more}`, first.ref, { cause: parsed.error });
  }

  const file = parsed.data;
  const seen = new Set<string>();
  const rules = file.rules.map(spec => {
    if (seen.has(spec.id)) throw new CatalogError(`rule "${spec.id}": duplicate rule id`, `rule "${spec.id}"`);
    seen.add(spec.id);
    return compileRule(spec);
  });

  const quantifier = compileRegex(file.quantifierPattern, 'i', 'quantifierPattern');
  const byAxis: Record<Axis, readonly PatternRule[]> = {
    ambiguity: Object.freeze(rules.filter(r => r.axis === 'ambiguity')),
    assumption: Object.freeze(rules.filter(r => r.axis === 'assumption'))
  };

  return Object.freeze({
    version: file.version,
    rules: Object.freeze(rules),
    quantifier,
    statementTypes: Object.freeze(file.statementTypes.map(st => Object.freeze({
      type: st.type,
      keywords: Object.freeze(st.keywords.map(lemmaOf))
    }))),
    rulesFor: (axis: Axis) => byAxis[axis]
  });
}

export function loadCatalogFile(file: string): PatternCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`Cannot read pattern catalog ${file}: ${reason}`, undefined, { cause: error });
  }
  return loadCatalog(raw);
}

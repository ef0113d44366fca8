import type { Axis, Finding, PatternRule } from '../types';
import type { Match } from './match';

const AXIS_ORDER: Record<Axis, number> = { ambiguity: 0, assumption: 1 };

export function renderTemplate(template: string, match: string): string {
  // replacer function: a '$' in the matched text is not a replacement pattern
  return template.replace(/\{match\}/g, () => match);
}

export function toFinding(rule: PatternRule, match: Match): Finding {
  return Object.freeze({
    ruleId: rule.id,
    category: rule.category,
    axis: rule.axis,
    text: match.text,
    start: match.start,
    end: match.end,
    sentence: match.sentence,
    message: renderTemplate(rule.message, match.text),
    weight: rule.weight,
    impact: rule.impact
  });
}

/** Keeps the first finding per (category, span); input order decides which. */
export function collapseDuplicates(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  return findings.filter(f => {
    const key = `${f.category}\u0000${f.start}:${f.end}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Stable report order: sentence, start offset, axis, then original (catalog)
 * order, then end offset.
 */
export function orderFindings(findings: readonly Finding[]): Finding[] {
  return findings
    .map((f, i) => ({ f, i }))
    .sort((a, b) =>
      a.f.sentence - b.f.sentence ||
      a.f.start - b.f.start ||
      AXIS_ORDER[a.f.axis] - AXIS_ORDER[b.f.axis] ||
      a.i - b.i ||
      a.f.end - b.f.end)
    .map(({ f }) => f);
}

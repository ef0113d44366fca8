import type { Axis, Finding, PatternCatalog } from '../types';
import { renderTemplate } from './findings';

const AXIS_ORDER: Record<Axis, number> = { ambiguity: 0, assumption: 1 };
const FALLBACK_QUESTION = "What specific criteria define '{match}'?";

/**
 * One clarification question per distinct (category, matched text), ordered
 * by axis and then by where the finding sits in the source text.
 */
export function suggest(findings: readonly Finding[], catalog: PatternCatalog, limit = 0): string[] {
  const rules = new Map(catalog.rules.map(r => [r.id, r]));
  const ordered = findings
    .map((f, i) => ({ f, i }))
    .sort((a, b) =>
      AXIS_ORDER[a.f.axis] - AXIS_ORDER[b.f.axis] ||
      a.f.start - b.f.start ||
      a.f.end - b.f.end ||
      a.i - b.i)
    .map(({ f }) => f);

  const pairs = new Set<string>();
  const questions: string[] = [];
  for (const f of ordered) {
    const matched = f.text.toLowerCase();
    const pair = `${f.category}\u0000${matched}`;
    if (pairs.has(pair)) continue;
    pairs.add(pair);

    const templates = rules.get(f.ruleId)?.questions;
    const template = templates?.[matched] ?? templates?.default ?? FALLBACK_QUESTION;
    const question = renderTemplate(template, f.text);
    if (!questions.includes(question)) questions.push(question);
  }

  return limit > 0 ? questions.slice(0, limit) : questions;
}

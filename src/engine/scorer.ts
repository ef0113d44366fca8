import type { Axis, Category, CategoryBreakdown, Confidence, Finding, ReadinessLevel, ScoreResult } from '../types';

export const READY_THRESHOLD = 70;
export const CLARIFICATION_THRESHOLD = 40;

export function clamp(value: number, min = 0, max = 100): number {
  return Math.min(max, Math.max(min, value));
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

// Sorted accumulation: the total does not depend on the order of the findings.
function sumWeights(weights: number[]): number {
  return [...weights].sort((a, b) => a - b).reduce((acc, w) => acc + w, 0);
}

export function axisScore(findings: readonly Finding[], axis: Axis): number {
  return round1(clamp(sumWeights(findings.filter(f => f.axis === axis).map(f => f.weight))));
}

export function readinessFrom(ambiguityScore: number, assumptionScore: number): number {
  return clamp(100 - (ambiguityScore + assumptionScore) / 2);
}

export function classifyReadiness(readinessScore: number): ReadinessLevel {
  if (readinessScore >= READY_THRESHOLD) return 'Ready';
  if (readinessScore >= CLARIFICATION_THRESHOLD) return 'NeedsClarification';
  return 'HighRisk';
}

function breakdown(findings: readonly Finding[]): CategoryBreakdown[] {
  const byCategory = new Map<Category, number[]>();
  for (const f of findings) {
    const weights = byCategory.get(f.category) ?? [];
    weights.push(f.weight);
    byCategory.set(f.category, weights);
  }
  return [...byCategory.entries()]
    .map(([category, weights]) => ({ category, count: weights.length, weight: sumWeights(weights) }))
    .sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));
}

export function scoreFindings(findings: readonly Finding[]): ScoreResult {
  const ambiguityScore = axisScore(findings, 'ambiguity');
  const assumptionScore = axisScore(findings, 'assumption');
  const readinessScore = readinessFrom(ambiguityScore, assumptionScore);

  return Object.freeze({
    ambiguityScore,
    assumptionScore,
    readinessScore,
    readinessLevel: classifyReadiness(readinessScore),
    breakdown: Object.freeze(breakdown(findings))
  });
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * HIGH needs ten or more words, at least two distinct ambiguity categories and
 * no more than one finding per two words. Any ambiguity finding in five or more
 * words is MEDIUM; everything else is LOW.
 */
export function ambiguityConfidence(words: number, findings: readonly Finding[]): Confidence {
  const ambiguous = findings.filter(f => f.axis === 'ambiguity');
  const categories = new Set(ambiguous.map(f => f.category)).size;

  if (words >= 10 && categories >= 2 && ambiguous.length / Math.max(words, 1) <= 0.5) return 'HIGH';
  if (words >= 5 && ambiguous.length > 0) return 'MEDIUM';
  return 'LOW';
}

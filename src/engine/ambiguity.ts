import type { AnnotatedText, CoarsePos, Finding, PatternCatalog } from '../types';
import { collapseDuplicates, toFinding } from './findings';
import { findMatches, sentenceSpans, type Match } from './match';

const NOUN_LIKE: ReadonlySet<CoarsePos> = new Set(['NOUN', 'PROPN']);
const DETERMINED: ReadonlySet<CoarsePos> = new Set(['NOUN', 'PROPN', 'ADJ', 'NUM']);

function quantifiedSentences(doc: AnnotatedText, catalog: PatternCatalog): Set<number> {
  const out = new Set<number>();
  for (const span of sentenceSpans(doc)) {
    if (catalog.quantifier.test(doc.text.slice(span.start, span.end))) out.add(span.index);
  }
  return out;
}

/**
 * Same-sentence lookback heuristic. The reference is unresolved when the
 * nearest preceding noun phrase is missing or is itself a pronoun. A
 * demonstrative directly followed by a noun or adjective ("this page") is a
 * determiner, not a reference.
 */
export function isUnresolvedReference(doc: AnnotatedText, match: Match): boolean {
  const { tokens } = doc;
  const ref = tokens[match.firstToken];
  // complementizer "that"
  if (ref.pos === 'ADP') return false;

  const next = tokens[match.lastToken + 1];
  if (ref.pos !== 'PRON' && next && next.sentence === ref.sentence && DETERMINED.has(next.pos)) return false;

  for (let j = match.firstToken - 1; j >= 0 && tokens[j].sentence === ref.sentence; j--) {
    const tok = tokens[j];
    if (tok.pos === 'PRON') return true;
    if (NOUN_LIKE.has(tok.pos)) return false;
    // head of a determiner phrase the tagger did not mark as a noun
    const prev = tokens[j - 1];
    if (prev && prev.sentence === ref.sentence && prev.pos === 'DET' && tok.pos !== 'PUNCT') return false;
  }
  return true;
}

export function detectAmbiguities(doc: AnnotatedText, catalog: PatternCatalog): Finding[] {
  const quantified = quantifiedSentences(doc, catalog);
  const findings: Finding[] = [];

  for (const rule of catalog.rulesFor('ambiguity')) {
    for (const match of findMatches(doc, rule.trigger)) {
      if (rule.suppressWhen === 'quantified' && quantified.has(match.sentence)) continue;
      if (rule.suppressWhen === 'antecedent' && !isUnresolvedReference(doc, match)) continue;
      findings.push(toFinding(rule, match));
    }
  }
  return collapseDuplicates(findings);
}

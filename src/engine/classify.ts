import type { AnnotatedText, PatternCatalog } from '../types';

export const GENERAL_STATEMENT = 'general';

// First catalog type with a keyword among the lemmas wins.
export function classifyStatement(doc: AnnotatedText, catalog: PatternCatalog): string {
  const lemmas = new Set(doc.tokens.map(t => t.lemma));
  const hit = catalog.statementTypes.find(st => st.keywords.some(k => lemmas.has(k)));
  return hit?.type ?? GENERAL_STATEMENT;
}

import natural from 'natural';

/**
 * Normalised lemma used for inflection-tolerant matching. Porter stems stand
 * in for dictionary lemmas: "handles", "handled" and "handling" all map to
 * "handl". Catalog lemma phrases go through the same function, so only
 * equality between the two sides matters.
 */
export function lemmaOf(word: string): string {
  const lower = word.toLowerCase();
  if (!/[a-z]/.test(lower)) return lower;
  return natural.PorterStemmer.stem(lower);
}

export function splitPhrase(phrase: string): string[] {
  return phrase.toLowerCase().split(/\s+/).filter(Boolean);
}

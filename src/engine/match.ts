import type { AnnotatedText, AnnotatedToken, CompiledTrigger } from '../types';

export interface Match {
  text: string;
  start: number;
  end: number;
  sentence: number;
  firstToken: number;
  lastToken: number;
}

export interface SentenceSpan {
  index: number;
  firstToken: number;
  lastToken: number;
  start: number;
  end: number;
}

export function sentenceSpans(doc: AnnotatedText): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  doc.tokens.forEach((tok, i) => {
    const current = spans[spans.length - 1];
    if (current && current.index === tok.sentence) {
      current.lastToken = i;
      current.end = tok.end;
    } else {
      spans.push({ index: tok.sentence, firstToken: i, lastToken: i, start: tok.start, end: tok.end });
    }
  });
  return spans;
}

function matchPhrases(
  doc: AnnotatedText,
  phrases: readonly (readonly string[])[],
  key: (t: AnnotatedToken) => string
): Match[] {
  const { tokens } = doc;
  const keys = tokens.map(key);
  const out: Match[] = [];

  for (let i = 0; i < tokens.length; i++) {
    for (const phrase of phrases) {
      const last = i + phrase.length - 1;
      if (last >= tokens.length || tokens[last].sentence !== tokens[i].sentence) continue;
      if (!phrase.every((word, k) => keys[i + k] === word)) continue;
      const start = tokens[i].start;
      const end = tokens[last].end;
      out.push({ text: doc.text.slice(start, end), start, end, sentence: tokens[i].sentence, firstToken: i, lastToken: last });
    }
  }
  return out;
}

function matchRegex(doc: AnnotatedText, pattern: RegExp): Match[] {
  const { tokens } = doc;
  const out: Match[] = [];

  for (const span of sentenceSpans(doc)) {
    const slice = doc.text.slice(span.start, span.end);
    for (const m of slice.matchAll(pattern)) {
      if (!m[0]) continue;
      const start = span.start + (m.index ?? 0);
      const end = start + m[0].length;
      let first = span.firstToken;
      while (first < span.lastToken && tokens[first].end <= start) first++;
      let last = first;
      while (last < span.lastToken && tokens[last + 1].start < end) last++;
      out.push({ text: m[0], start, end, sentence: span.index, firstToken: first, lastToken: last });
    }
  }
  return out;
}

function matchTrigger(doc: AnnotatedText, trigger: CompiledTrigger): Match[] {
  switch (trigger.kind) {
    case 'literal':
      return matchPhrases(doc, trigger.phrases, t => t.text.toLowerCase());
    case 'lemma':
      return matchPhrases(doc, trigger.phrases, t => t.lemma);
    case 'regex':
      return matchRegex(doc, trigger.pattern);
  }
}

/** All matches of a trigger, ordered by start offset then end offset. */
export function findMatches(doc: AnnotatedText, trigger: CompiledTrigger): Match[] {
  return matchTrigger(doc, trigger).sort((a, b) => a.start - b.start || a.end - b.end);
}

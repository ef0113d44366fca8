import natural from 'natural';
import { AnnotatorError } from '../errors';
import type { AnnotatedText, AnnotatedToken, CoarsePos } from '../types';
import { lemmaOf } from './lemma';

/**
 * Converts raw text into annotated tokens. The engine consumes this
 * interface only; any tokenizer/tagger can sit behind it as long as its
 * lemmas agree with `lemmaOf`.
 */
export interface Annotator {
  annotate(text: string): AnnotatedText;
}

const TOKEN_RE = /\p{N}+(?:[.,]\p{N}+)*|\p{L}[\p{L}\p{N}]*(?:['’-][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu;
const SENTENCE_END = new Set(['.', '!', '?']);
const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// Penn Treebank tag -> coarse part of speech
const PENN_TO_COARSE: Record<string, CoarsePos> = {
  NN: 'NOUN', NNS: 'NOUN', NNP: 'PROPN', NNPS: 'PROPN',
  VB: 'VERB', VBD: 'VERB', VBG: 'VERB', VBN: 'VERB', VBP: 'VERB', VBZ: 'VERB',
  MD: 'AUX',
  JJ: 'ADJ', JJR: 'ADJ', JJS: 'ADJ',
  RB: 'ADV', RBR: 'ADV', RBS: 'ADV', WRB: 'ADV',
  PRP: 'PRON', PRP$: 'PRON', WP: 'PRON', WP$: 'PRON', EX: 'PRON',
  DT: 'DET', PDT: 'DET', WDT: 'DET',
  IN: 'ADP',
  CC: 'CCONJ',
  CD: 'NUM',
  TO: 'PART', RP: 'PART', POS: 'PART'
};

export interface RawToken {
  text: string;
  start: number;
  end: number;
  sentence: number;
}

function coarse(tag: string | undefined, text: string): CoarsePos {
  if (/^\p{N}/u.test(text)) return 'NUM';
  if (!/[\p{L}\p{N}]/u.test(text)) return 'PUNCT';
  return (tag && PENN_TO_COARSE[tag]) || 'X';
}

/** Splits text into word, number and punctuation tokens with sentence indices. */
export function tokenize(text: string): RawToken[] {
  const out: RawToken[] = [];
  let sentence = 0;
  let lastEnd = 0;
  let boundary = false;

  for (const m of text.matchAll(TOKEN_RE)) {
    const start = m.index ?? 0;
    const gap = text.slice(lastEnd, start);
    if (out.length > 0 && (boundary || gap.includes('\n'))) sentence++;
    boundary = false;

    out.push({ text: m[0], start, end: start + m[0].length, sentence });
    if (SENTENCE_END.has(m[0])) boundary = true;
    lastEnd = start + m[0].length;
  }
  return out;
}

/**
 * Default annotator: regex tokenization with character spans, `natural`'s
 * Brill tagger for parts of speech and the Porter stemmer for lemmas.
 */
export class NaturalAnnotator implements Annotator {
  private tagger?: natural.BrillPOSTagger;

  private getTagger(): natural.BrillPOSTagger {
    if (!this.tagger) {
      const lexicon = new natural.Lexicon('EN', 'N', 'NNP');
      const ruleSet = new natural.RuleSet('EN');
      this.tagger = new natural.BrillPOSTagger(lexicon, ruleSet);
    }
    return this.tagger;
  }

  annotate(text: string): AnnotatedText {
    if (UNPAIRED_SURROGATE.test(text)) {
      throw new AnnotatorError('Input is not valid UTF-16 text (unpaired surrogate)');
    }

    const raw = tokenize(text);
    const tokens: AnnotatedToken[] = [];
    let i = 0;
    while (i < raw.length) {
      const sentence = raw[i].sentence;
      let j = i;
      while (j < raw.length && raw[j].sentence === sentence) j++;
      const group = raw.slice(i, j);

      const tagged = this.getTagger().tag(group.map(t => t.text)).taggedWords;
      group.forEach((t, k) => {
        tokens.push(Object.freeze({
          text: t.text,
          lemma: lemmaOf(t.text),
          pos: coarse(tagged[k]?.tag, t.text),
          sentence,
          start: t.start,
          end: t.end
        }));
      });
      i = j;
    }

    return Object.freeze({ text, tokens: Object.freeze(tokens) });
  }
}

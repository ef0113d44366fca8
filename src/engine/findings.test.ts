import { describe, it, expect } from 'vitest';
import { CATEGORY_AXIS, type Category, type Finding } from '../types';
import { collapseDuplicates, orderFindings, renderTemplate } from './findings';

function finding(ruleId: string, category: Category, start: number, end: number, sentence = 0): Finding {
  return {
    ruleId,
    category,
    axis: CATEGORY_AXIS[category],
    text: 'x',
    start,
    end,
    sentence,
    message: 'x',
    weight: 10
  };
}

describe('renderTemplate', () => {
  it('replaces every placeholder', () => {
    expect(renderTemplate("'{match}' or '{match}'", 'fast')).toBe("'fast' or 'fast'");
  });

  it('inserts dollar sequences literally', () => {
    expect(renderTemplate("bad '{match}'", '$&')).toBe("bad '$&'");
    expect(renderTemplate("bad '{match}'", "$'")).toBe("bad '$''");
    expect(renderTemplate("bad '{match}'", '$`')).toBe("bad '$`'");
  });
});

describe('collapseDuplicates', () => {
  it('keeps the first finding per category and span', () => {
    const kept = collapseDuplicates([
      finding('a', 'Non-testable statement', 0, 5),
      finding('b', 'Non-testable statement', 0, 5),
      finding('c', 'Subjective term', 0, 5)
    ]);
    expect(kept.map(f => f.ruleId)).toEqual(['a', 'c']);
  });
});

describe('orderFindings', () => {
  it('orders by sentence, start and axis', () => {
    const ordered = orderFindings([
      finding('later-sentence', 'Weak modality', 0, 3, 1),
      finding('assumption', 'Data assumption', 4, 8),
      finding('ambiguity', 'Weak modality', 4, 6),
      finding('first', 'Subjective term', 0, 2)
    ]);
    expect(ordered.map(f => f.ruleId)).toEqual(['first', 'ambiguity', 'assumption', 'later-sentence']);
  });
});

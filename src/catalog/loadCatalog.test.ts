import { describe, it, expect } from 'vitest';
import { DEFAULT_CATALOG_PATH } from '../config';
import { CatalogError } from '../errors';
import { lemmaOf } from '../nlp/lemma';
import { loadCatalog, loadCatalogFile } from './loadCatalog';

function rule(overrides: Record<string, unknown> = {}) {
  return {
    id: 'r1',
    category: 'Weak modality',
    trigger: { type: 'literal', phrases: ['should'] },
    weight: 20,
    message: "Weak term '{match}'",
    questions: { default: "Is '{match}' required?" },
    ...overrides
  };
}

function catalog(rules: unknown[], extra: Record<string, unknown> = {}) {
  return { version: 'test-1', quantifierPattern: '\\d+\\s*ms', rules, ...extra };
}

function errorOf(fn: () => unknown): CatalogError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CatalogError) return error;
    throw error;
  }
  throw new Error('expected a CatalogError');
}

describe('loadCatalogFile', () => {
  it('loads the bundled catalog', () => {
    const cat = loadCatalogFile(DEFAULT_CATALOG_PATH);
    expect(cat.version).toBe('1.0.0');
    expect(cat.rules).toHaveLength(9);
    expect(cat.rulesFor('assumption').map(r => r.id)).toEqual([
      'environment-unqualified',
      'environment-ui-interaction',
      'data-presumed',
      'state-presumed'
    ]);
    expect(cat.statementTypes[0].type).toBe('authentication');
  });

  it('reports unreadable files as catalog errors', () => {
    expect(() => loadCatalogFile('/nonexistent/catalog.json')).toThrow(/^Cannot read pattern catalog \/nonexistent\/catalog\.json: /);
  });
});

describe('loadCatalog', () => {
  it('derives the axis from the category', () => {
    const cat = loadCatalog(catalog([
      rule(),
      rule({ id: 'r2', category: 'Data assumption' })
    ]));
    expect(cat.rulesFor('ambiguity').map(r => r.id)).toEqual(['r1']);
    expect(cat.rulesFor('assumption').map(r => r.id)).toEqual(['r2']);
    expect(cat.rules[1].axis).toBe('assumption');
  });

  it('compiles regex triggers case-insensitive and global by default', () => {
    const cat = loadCatalog(catalog([rule({ trigger: { type: 'regex', pattern: 'work\\w*' } })]));
    const trigger = cat.rules[0].trigger;
    expect(trigger.kind).toBe('regex');
    if (trigger.kind === 'regex') expect(trigger.pattern.flags).toBe('gi');
  });

  it('honours explicit regex flags', () => {
    const cat = loadCatalog(catalog([rule({ trigger: { type: 'regex', pattern: 'Work', flags: 'u' } })]));
    const trigger = cat.rules[0].trigger;
    if (trigger.kind === 'regex') expect(trigger.pattern.flags).toBe('gu');
  });

  it('lemmatizes lemma phrases and statement keywords', () => {
    const cat = loadCatalog(catalog(
      [rule({ trigger: { type: 'lemma', phrases: ['Handle Errors'] } })],
      { statementTypes: [{ type: 'deletion', keywords: ['deleting'] }] }
    ));
    const trigger = cat.rules[0].trigger;
    expect(trigger.kind).toBe('lemma');
    if (trigger.kind === 'lemma') expect(trigger.phrases).toEqual([[lemmaOf('handle'), lemmaOf('errors')]]);
    expect(cat.statementTypes[0].keywords).toEqual([lemmaOf('deleting')]);
  });

  it('lowercases question keys', () => {
    const cat = loadCatalog(catalog([rule({ questions: { default: 'd', Should: "Must '{match}' happen?" } })]));
    expect(cat.rules[0].questions).toEqual({ default: 'd', should: "Must '{match}' happen?" });
  });

  it('defaults satisfier scope to preceding', () => {
    const cat = loadCatalog(catalog([rule({
      category: 'State assumption',
      satisfiedBy: { trigger: { type: 'literal', phrases: ['log in'] } }
    })]));
    expect(cat.rules[0].satisfiedBy?.scope).toBe('preceding');
  });

  it('returns an immutable snapshot', () => {
    const cat = loadCatalog(catalog([rule()]));
    expect(Object.isFrozen(cat)).toBe(true);
    expect(Object.isFrozen(cat.rules)).toBe(true);
    expect(Object.isFrozen(cat.rules[0])).toBe(true);
  });

  it('names the rule with a non-positive weight', () => {
    const error = errorOf(() => loadCatalog(catalog([rule({ weight: -5 })])));
    expect(error.message).toBe('Invalid pattern catalog: rule "r1": weight: Number must be greater than 0');
    expect(error.ruleRef).toBe('rule "r1"');
  });

  it('rejects unknown categories', () => {
    expect(() => loadCatalog(catalog([rule({ category: 'Bogus' })]))).toThrow(/rule "r1": category: Invalid enum value/);
  });

  it('requires a default question template', () => {
    const error = errorOf(() => loadCatalog(catalog([rule({ questions: { should: 'q' } })])));
    expect(error.message).toBe('Invalid pattern catalog: rule "r1": questions: questions must include a "default" template');
  });

  it('falls back to the rule index when the id is missing', () => {
    const error = errorOf(() => loadCatalog(catalog([rule(), rule({ id: undefined })])));
    expect(error.ruleRef).toBe('rule #1');
  });

  it('rejects a malformed regular expression', () => {
    const error = errorOf(() => loadCatalog(catalog([rule({ trigger: { type: 'regex', pattern: '(' } })])));
    expect(error.message).toMatch(/^rule "r1": invalid regular expression \/\(\/: /);
  });

  it('rejects duplicate rule ids', () => {
    expect(() => loadCatalog(catalog([rule(), rule()]))).toThrow('rule "r1": duplicate rule id');
  });

  it('rejects suppressWhen on assumption rules', () => {
    expect(() => loadCatalog(catalog([rule({ category: 'Data assumption', suppressWhen: 'quantified' })])))
      .toThrow('rule "r1": suppressWhen applies to ambiguity categories only (got "Data assumption")');
  });

  it('rejects satisfiedBy on ambiguity rules', () => {
    expect(() => loadCatalog(catalog([rule({ satisfiedBy: { trigger: { type: 'literal', phrases: ['x'] } } })])))
      .toThrow('rule "r1": satisfiedBy applies to assumption categories only (got "Weak modality")');
  });

  it('rejects an empty rule list', () => {
    expect(() => loadCatalog(catalog([]))).toThrow(CatalogError);
  });
});

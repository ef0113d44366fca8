import type { AnnotatedText, Finding, PatternCatalog, SatisfierScope } from '../types';
import { collapseDuplicates, toFinding } from './findings';
import { findMatches, type Match } from './match';

function isSatisfied(trigger: Match, satisfiers: readonly Match[], scope: SatisfierScope): boolean {
  switch (scope) {
    case 'preceding':
      return satisfiers.some(s => s.start < trigger.start);
    case 'sentence':
      return satisfiers.some(s => s.sentence === trigger.sentence);
    case 'text':
      return satisfiers.length > 0;
  }
}

/**
 * A trigger reports a missing precondition unless the rule's satisfying
 * pattern shows up in scope. The default scope only looks backwards: a
 * precondition has to be set up before it is relied on.
 */
export function detectAssumptions(doc: AnnotatedText, catalog: PatternCatalog): Finding[] {
  const findings: Finding[] = [];

  for (const rule of catalog.rulesFor('assumption')) {
    const satisfiers = rule.satisfiedBy ? findMatches(doc, rule.satisfiedBy.trigger) : [];
    const scope = rule.satisfiedBy?.scope ?? 'preceding';

    for (const match of findMatches(doc, rule.trigger)) {
      if (isSatisfied(match, satisfiers, scope)) continue;
      findings.push(toFinding(rule, match));
    }
  }
  return collapseDuplicates(findings);
}

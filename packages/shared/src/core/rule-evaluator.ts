/**
 * Rule Evaluator - decides whether a RuleSet matches a configuration.
 *
 * AND across entries, OR across each entry's allowed values, strict equality.
 * Every entry is evaluated so diagnostics see the full picture; entries are
 * independent, so evaluation order does not matter.
 */

import type { ConfigurationObject, RuleLiteral, RuleSet } from '../types';
import { resolvePath } from './path-resolver';

export interface RuleEntryOutcome {
  path: string;
  allowed: readonly RuleLiteral[];
  /** False when the path resolved to NotFound */
  found: boolean;
  value?: unknown;
  matched: boolean;
}

/**
 * Evaluate each `(path, allowedValues)` entry of a rule set.
 */
export function evaluateRuleEntries(
  config: ConfigurationObject,
  ruleSet: RuleSet
): RuleEntryOutcome[] {
  return Object.entries(ruleSet).map(([path, allowed]) => {
    const lookup = resolvePath(config, path);
    if (!lookup.found) {
      return { path, allowed, found: false, matched: false };
    }
    return {
      path,
      allowed,
      found: true,
      value: lookup.value,
      matched: allowed.some((candidate) => candidate === lookup.value),
    };
  });
}

/**
 * True when every entry resolves to one of its allowed values.
 *
 * An empty rule set matches vacuously; the schema loader rejects empty rule
 * sets on present rules, so this only arises for hand-built schemas.
 */
export function matches(config: ConfigurationObject, ruleSet: RuleSet): boolean {
  return evaluateRuleEntries(config, ruleSet).every((outcome) => outcome.matched);
}

/**
 * Paths a rule set reads.
 */
export function ruleSetPaths(ruleSet: RuleSet | undefined): string[] {
  return ruleSet ? Object.keys(ruleSet) : [];
}

/**
 * Field Resolver - visibility of a single field.
 *
 * - no rule: always visible
 * - show only: visible iff show matches
 * - hide only: visible iff hide does not match
 * - both: show is the gate, hide the veto
 */

import type { ConfigurationObject, FieldDefinition } from '../types';
import { evaluateRuleEntries, type RuleEntryOutcome } from './rule-evaluator';

export interface VisibilityExplanation {
  path: string;
  visible: boolean;
  /** Per-entry outcomes of the show rule, when there is one */
  show?: RuleEntryOutcome[];
  /** Per-entry outcomes of the hide rule, when there is one */
  hide?: RuleEntryOutcome[];
}

/**
 * Decide a field's visibility, keeping the evaluated rule entries.
 */
export function explainVisibility(
  config: ConfigurationObject,
  field: FieldDefinition
): VisibilityExplanation {
  const rule = field.visibilityRule;
  if (!rule) {
    return { path: field.path, visible: true };
  }

  const explanation: VisibilityExplanation = { path: field.path, visible: true };

  if (rule.show) {
    explanation.show = evaluateRuleEntries(config, rule.show);
    if (!explanation.show.every((outcome) => outcome.matched)) {
      explanation.visible = false;
    }
  }

  if (rule.hide) {
    explanation.hide = evaluateRuleEntries(config, rule.hide);
    if (explanation.hide.every((outcome) => outcome.matched)) {
      explanation.visible = false;
    }
  }

  return explanation;
}

export function isVisible(config: ConfigurationObject, field: FieldDefinition): boolean {
  return explainVisibility(config, field).visible;
}

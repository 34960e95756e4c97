/**
 * Schema Resolver - visibility and requirement of every field in a schema.
 *
 * Each field is evaluated once against the same, unmodified configuration.
 * A rule reads the stored value at its path whether or not the field owning
 * that path is visible, so rule references that form a cycle are still
 * decided in a single pass.
 */

import type {
  ConfigurationObject,
  FieldDefinition,
  RequirementSet,
  SchemaResolution,
  UnitSchema,
  VisibilitySet,
} from '../types';
import { isVisible } from './field-resolver';
import { ruleSetPaths } from './rule-evaluator';

// =============================================================================
// § Resolution
// =============================================================================

export function resolveVisibility(
  config: ConfigurationObject,
  schema: UnitSchema
): VisibilitySet {
  const visibility = new Map<string, boolean>();
  for (const field of schema.fields) {
    visibility.set(field.path, isVisible(config, field));
  }
  return visibility;
}

export function resolveRequirements(
  schema: UnitSchema,
  visibility: VisibilitySet
): RequirementSet {
  const required = new Set<string>();
  for (const field of schema.fields) {
    if (field.requiredWhenVisible && visibility.get(field.path) === true) {
      required.add(field.path);
    }
  }
  return required;
}

export function resolveSchema(
  config: ConfigurationObject,
  schema: UnitSchema
): SchemaResolution {
  const visibility = resolveVisibility(config, schema);
  return { visibility, required: resolveRequirements(schema, visibility) };
}

/**
 * Fields visible for a configuration, in declaration order.
 */
export function getVisibleFields(
  config: ConfigurationObject,
  schema: UnitSchema
): FieldDefinition[] {
  const visibility = resolveVisibility(config, schema);
  return schema.fields.filter((field) => visibility.get(field.path) === true);
}

// =============================================================================
// § Circular Rule Detection
// =============================================================================

/**
 * Field paths a field's rules depend on.
 */
function fieldDependencies(field: FieldDefinition): string[] {
  const rule = field.visibilityRule;
  return [...ruleSetPaths(rule?.show), ...ruleSetPaths(rule?.hide)];
}

/**
 * Detect cycles in rule references.
 * Returns the field paths of each cycle (first path repeated at the end),
 * or an empty array if none. Cycles are legal; this is for diagnostics.
 */
export function detectCircularRules(schema: UnitSchema): string[][] {
  const byPath = new Map(schema.fields.map((field) => [field.path, field]));
  const cycles: string[][] = [];
  const seen = new Set<string>();
  const visited = new Set<string>();
  const stack: string[] = [];

  function dfs(path: string): void {
    if (stack.includes(path)) {
      const cycle = [...stack.slice(stack.indexOf(path)), path];
      const key = [...cycle.slice(0, -1)].sort().join('|');
      if (!seen.has(key)) {
        seen.add(key);
        cycles.push(cycle);
      }
      return;
    }
    if (visited.has(path)) return;

    const field = byPath.get(path);
    stack.push(path);
    if (field) {
      for (const dep of fieldDependencies(field)) {
        dfs(dep);
      }
    }
    stack.pop();
    visited.add(path);
  }

  for (const field of schema.fields) {
    visited.clear();
    dfs(field.path);
  }

  return cycles;
}

// =============================================================================
// § Reference Checks
// =============================================================================

export interface UnknownRuleReference {
  /** Field owning the rule */
  fieldPath: string;
  rule: 'show' | 'hide';
  /** Referenced path that is not a declared field path */
  reference: string;
}

/**
 * Rule references that are not declared field paths. A container path counts
 * as unknown: it resolves to an object or array, which no rule literal equals.
 * Loaded schemas never contain any; hand-built schemas are checked by the
 * validator.
 */
export function findUnknownRuleReferences(schema: UnitSchema): UnknownRuleReference[] {
  const paths = new Set(schema.fields.map((field) => field.path));

  const unknown: UnknownRuleReference[] = [];
  for (const field of schema.fields) {
    for (const rule of ['show', 'hide'] as const) {
      for (const reference of ruleSetPaths(field.visibilityRule?.[rule])) {
        if (!paths.has(reference)) {
          unknown.push({ fieldPath: field.path, rule, reference });
        }
      }
    }
  }
  return unknown;
}

/**
 * Schema Builder
 *
 * Shared last step of every parser: compiles discriminators into show rules,
 * checks schema invariants and publishes a frozen UnitSchema. All issues of a
 * definition are collected before anything is thrown, so an author sees every
 * problem in one pass.
 */

import {
  detectCircularRules,
  isValidPath,
  type FamilyDefinition,
  type FieldDefinition,
  type RuleLiteral,
  type RuleSet,
  type UnitSchema,
} from '@fieldgate/shared';
import type { DiscriminatorDefinition } from '../schemas/unit-definition';
import { SchemaValidationError, type SchemaIssue } from '../types/errors';
import type { ParserOptions } from '../types/parser';

export interface SchemaDraft {
  unitType: string;
  version?: number;
  displayName?: string;
  fields: FieldDefinition[];
  families: FamilyDefinition[];
  discriminators: DiscriminatorDefinition[];
}

export const DEFAULT_PARSER_OPTIONS: Required<ParserOptions> = {
  strict: true,
  warnOnCycles: true,
};

/**
 * Compile, check and freeze a draft.
 *
 * @throws {SchemaValidationError} with every issue found
 */
export function buildUnitSchema(
  draft: SchemaDraft,
  options: ParserOptions = {}
): UnitSchema {
  const resolved = { ...DEFAULT_PARSER_OPTIONS, ...options };
  const issues: SchemaIssue[] = [];

  checkFieldPaths(draft.fields, issues);
  const fields = applyDiscriminators(draft.fields, draft.discriminators, resolved.strict, issues);
  const knownPath = createPathLookup(fields);

  for (const field of fields) {
    checkRuleSet(field.path, 'show', field.visibilityRule?.show, knownPath, issues);
    checkRuleSet(field.path, 'hide', field.visibilityRule?.hide, knownPath, issues);
  }
  checkFamilies(fields, draft.families, issues);

  if (issues.length > 0) {
    throw new SchemaValidationError(
      `Unit "${draft.unitType}" has ${issues.length} schema issue(s): ` +
        issues.map((issue) => `${issue.kind} at '${issue.path}'`).join(', '),
      issues,
      { unitType: draft.unitType }
    );
  }

  const schema: UnitSchema = {
    unitType: draft.unitType,
    ...(draft.version !== undefined ? { version: draft.version } : {}),
    ...(draft.displayName !== undefined ? { displayName: draft.displayName } : {}),
    fields,
    families: draft.families,
  };

  if (resolved.warnOnCycles) {
    for (const cycle of detectCircularRules(schema)) {
      console.warn(
        `[fieldgate] Circular visibility rules in "${schema.unitType}": ${cycle.join(' -> ')}. ` +
          'Each rule reads the stored value once; no iteration is performed.'
      );
    }
  }

  return deepFreeze(schema);
}

// =============================================================================
// § Field checks
// =============================================================================

function checkFieldPaths(fields: FieldDefinition[], issues: SchemaIssue[]): void {
  const seen = new Set<string>();
  for (const field of fields) {
    if (!isValidPath(field.path)) {
      issues.push({
        path: field.path,
        kind: 'InvalidPath',
        message: `Field path '${field.path}' is empty or has an empty segment`,
      });
    }
    if (seen.has(field.path)) {
      issues.push({
        path: field.path,
        kind: 'DuplicatePath',
        message: `Field path '${field.path}' is declared more than once`,
      });
    }
    seen.add(field.path);

    if (field.kind === 'enum' && (!field.options || field.options.length === 0)) {
      issues.push({
        path: field.path,
        kind: 'MissingEnumOptions',
        message: `Enum field '${field.path}' must list its options`,
      });
    }
  }
}

/**
 * A rule may only read a declared field. A container path resolves to an
 * object or array, which no rule literal can equal.
 */
function createPathLookup(fields: readonly FieldDefinition[]): (path: string) => boolean {
  const paths = new Set(fields.map((field) => field.path));
  return (path) => paths.has(path);
}

function checkRuleSet(
  owner: string,
  which: 'show' | 'hide',
  ruleSet: RuleSet | undefined,
  knownPath: (path: string) => boolean,
  issues: SchemaIssue[]
): void {
  if (!ruleSet) return;

  const entries = Object.entries(ruleSet);
  if (entries.length === 0) {
    issues.push({
      path: owner,
      kind: 'EmptyRuleSet',
      message: `The ${which} rule of '${owner}' has no entries`,
    });
    return;
  }

  for (const [ref, allowed] of entries) {
    if (!isValidPath(ref)) {
      issues.push({
        path: owner,
        kind: 'InvalidPath',
        message: `The ${which} rule of '${owner}' reads malformed path '${ref}'`,
      });
      continue;
    }
    if (!knownPath(ref)) {
      issues.push({
        path: owner,
        kind: 'UnknownPath',
        message: `The ${which} rule of '${owner}' references unknown path '${ref}'`,
      });
    }
    if (allowed.length === 0) {
      issues.push({
        path: owner,
        kind: 'EmptyAllowedValues',
        message: `The ${which} rule of '${owner}' lists no values for '${ref}'`,
      });
    }
  }
}

// =============================================================================
// § Discriminators
// =============================================================================

/**
 * Turn each `{ path, activates }` map into show entries on the activated
 * fields. A field not named under any value keeps its rules unchanged.
 */
function applyDiscriminators(
  fields: FieldDefinition[],
  discriminators: DiscriminatorDefinition[],
  strict: boolean,
  issues: SchemaIssue[]
): FieldDefinition[] {
  const activations = new Map<string, Map<string, RuleLiteral[]>>();
  const byPath = new Map(fields.map((field) => [field.path, field]));

  for (const discriminator of discriminators) {
    const source = byPath.get(discriminator.path);
    if (!source || source.kind !== 'enum' || !source.options) {
      issues.push({
        path: discriminator.path,
        kind: 'InvalidDiscriminator',
        message: `Discriminator '${discriminator.path}' must be a declared enum field`,
      });
      continue;
    }
    const options = source.options;

    for (const [key, targets] of Object.entries(discriminator.activates)) {
      const option = options.find((candidate) => String(candidate) === key);
      if (option === undefined) {
        issues.push({
          path: discriminator.path,
          kind: 'InvalidDiscriminator',
          message: `Discriminator '${discriminator.path}' has no option '${key}'`,
        });
        continue;
      }

      for (const target of targets) {
        if (!byPath.has(target)) {
          issues.push({
            path: discriminator.path,
            kind: 'UnknownPath',
            message: `Discriminator '${discriminator.path}' activates unknown field '${target}'`,
          });
          continue;
        }
        const perField = activations.get(target) ?? new Map<string, RuleLiteral[]>();
        perField.set(discriminator.path, [...(perField.get(discriminator.path) ?? []), option]);
        activations.set(target, perField);
      }
    }

    if (strict) {
      const missing = options.filter((option) => !(String(option) in discriminator.activates));
      if (missing.length > 0) {
        issues.push({
          path: discriminator.path,
          kind: 'NonExhaustiveDiscriminator',
          message: `Discriminator '${discriminator.path}' does not map option(s): ${missing.join(', ')}`,
        });
      }
    }
  }

  return fields.map((field) => {
    const perField = activations.get(field.path);
    if (!perField) return field;

    const show: Record<string, readonly RuleLiteral[]> = { ...field.visibilityRule?.show };
    for (const [discriminatorPath, values] of perField) {
      if (discriminatorPath in show) {
        issues.push({
          path: field.path,
          kind: 'ConflictingRule',
          message: `'${field.path}' already has a show entry for discriminator '${discriminatorPath}'`,
        });
        continue;
      }
      show[discriminatorPath] = values;
    }
    return { ...field, visibilityRule: { ...field.visibilityRule, show } };
  });
}

// =============================================================================
// § Families
// =============================================================================

function familyPaths(family: FamilyDefinition): string[] {
  switch (family.tag) {
    case 'comparison-operator':
      return [
        family.operatorPath,
        family.secondOperandPath,
        ...(family.singleValueFlagPath !== undefined ? [family.singleValueFlagPath] : []),
      ];
  }
}

function checkFamilies(
  fields: readonly FieldDefinition[],
  families: readonly FamilyDefinition[],
  issues: SchemaIssue[]
): void {
  const byPath = new Map(fields.map((field) => [field.path, field]));

  for (const family of families) {
    for (const path of familyPaths(family)) {
      const field = byPath.get(path);
      if (!field) {
        issues.push({
          path,
          kind: 'UnknownPath',
          message: `Family '${family.tag}' references unknown field '${path}'`,
        });
      } else if (field.familyTag !== family.tag) {
        issues.push({
          path,
          kind: 'FamilyMismatch',
          message: `Field '${path}' belongs to family '${family.tag}' but is tagged '${field.familyTag ?? 'none'}'`,
        });
      }
    }
  }
}

// =============================================================================
// § Publishing
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

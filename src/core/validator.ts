/**
 * Validator - visibility-aware validation with structured error reporting
 *
 * Implements:
 * - Visibility resolution against the caller's configuration
 * - Normalization before any field is checked
 * - Per-field UnknownPath / MissingRequired / SetWhileHidden / TypeMismatch
 *   findings, in field declaration order
 * - Kind checks compiled once with Ajv
 */

import Ajv, { type ValidateFunction } from 'ajv';
import {
  findUnknownRuleReferences,
  resolvePath,
  resolveVisibility,
  type ConfigurationObject,
  type FieldDefinition,
  type FieldKind,
  type UnitSchema,
  type ValidationError,
} from '@fieldgate/shared';
import type { ValidationResult } from '../types';
import { getNormalizer, type Normalizer } from './normalizer';

/**
 * Configuration options for the Validator.
 */
export interface ValidatorConfig {
  /** Emit SetWhileHidden findings (default: true) */
  reportHiddenValues?: boolean;
  /** Strings starting with this prefix are expressions and skip kind checks */
  expressionPrefix?: string;
}

type KindSchema =
  | { type: Exclude<FieldKind, 'enum'> | Array<'string' | 'number' | 'boolean'> }
  | { enum: readonly unknown[] };

/**
 * Validator class for unit configurations.
 *
 * Findings are returned as data; validate() never throws for a configuration.
 * `valid` is false when any MissingRequired, TypeMismatch or UnknownPath
 * finding exists. SetWhileHidden is advisory.
 */
export class Validator {
  private readonly ajv: Ajv;
  private readonly compiledChecks: Map<string, ValidateFunction> = new Map();
  private readonly unknownReferences = new WeakMap<UnitSchema, Map<string, ValidationError[]>>();
  private readonly reportHiddenValues: boolean;
  private readonly expressionPrefix: string | undefined;

  constructor(config: ValidatorConfig = {}) {
    this.ajv = new Ajv({
      allErrors: true,
      allowUnionTypes: true, // enum fields without options accept any scalar
    });
    this.reportHiddenValues = config.reportHiddenValues ?? true;
    this.expressionPrefix = config.expressionPrefix || undefined;
  }

  /**
   * Validates a configuration against a unit schema.
   *
   * @param normalizer - Defaults to the shared Normalizer for `schema`
   */
  validate(
    config: ConfigurationObject,
    schema: UnitSchema,
    normalizer: Normalizer = getNormalizer(schema)
  ): ValidationResult {
    const visibility = resolveVisibility(config, schema);
    const normalized = normalizer.normalize(config, visibility);
    const suppressed = new Set(normalized.suppressedPaths);
    const injected = new Set(normalized.injectedPaths);

    const unknownReferences = this.getUnknownReferences(schema);
    const errors: ValidationError[] = [];

    for (const field of schema.fields) {
      errors.push(...(unknownReferences.get(field.path) ?? []));

      if (suppressed.has(field.path)) {
        continue;
      }

      const visible = visibility.get(field.path) === true;
      const lookup = resolvePath(normalized.config, field.path);

      if (!lookup.found) {
        if (visible && field.requiredWhenVisible) {
          errors.push({
            path: field.path,
            kind: 'MissingRequired',
            message: `Field '${field.path}' is required`,
            expected: field.kind,
          });
        }
        continue;
      }

      if (!visible && this.reportHiddenValues && !injected.has(field.path)) {
        errors.push({
          path: field.path,
          kind: 'SetWhileHidden',
          message: `Field '${field.path}' is set but not visible for the current configuration`,
          received: lookup.value,
        });
      }

      const mismatch = this.checkKind(field, lookup.value);
      if (mismatch) {
        errors.push(mismatch);
      }
    }

    return toResult(errors);
  }

  /**
   * Returns a TypeMismatch finding when the value disagrees with the field kind.
   */
  private checkKind(field: FieldDefinition, value: unknown): ValidationError | null {
    if (this.isExpression(value)) {
      return null;
    }

    const check = this.getCompiledCheck(kindSchema(field));
    if (check(value)) {
      return null;
    }

    if (field.kind === 'enum' && field.options) {
      return {
        path: field.path,
        kind: 'TypeMismatch',
        message: `Value for '${field.path}' must be one of: ${field.options.join(', ')}`,
        expected: field.options,
        received: value,
      };
    }

    return {
      path: field.path,
      kind: 'TypeMismatch',
      message: `Expected ${field.kind} for '${field.path}', but received ${describeType(value)}`,
      expected: field.kind,
      received: describeType(value),
    };
  }

  private isExpression(value: unknown): boolean {
    return (
      this.expressionPrefix !== undefined &&
      typeof value === 'string' &&
      value.startsWith(this.expressionPrefix)
    );
  }

  /**
   * Gets or compiles a kind check. Caches compiled checks for performance.
   */
  private getCompiledCheck(schema: KindSchema): ValidateFunction {
    const key = JSON.stringify(schema);

    let check = this.compiledChecks.get(key);
    if (!check) {
      check = this.ajv.compile(schema);
      this.compiledChecks.set(key, check);
    }

    return check;
  }

  /**
   * UnknownPath findings per owning field, for rules that reference no field.
   * Loaded schemas have none; the result depends only on the schema and is
   * memoized.
   */
  private getUnknownReferences(schema: UnitSchema): ReadonlyMap<string, ValidationError[]> {
    let findings = this.unknownReferences.get(schema);
    if (!findings) {
      findings = new Map();
      for (const { fieldPath, rule, reference } of findUnknownRuleReferences(schema)) {
        const perField = findings.get(fieldPath) ?? [];
        perField.push({
          path: fieldPath,
          kind: 'UnknownPath',
          message: `The ${rule} rule of '${fieldPath}' references unknown path '${reference}'`,
          expected: 'a declared field path',
          received: reference,
        });
        findings.set(fieldPath, perField);
      }
      this.unknownReferences.set(schema, findings);
    }
    return findings;
  }
}

function kindSchema(field: FieldDefinition): KindSchema {
  if (field.kind !== 'enum') {
    return { type: field.kind };
  }
  return field.options ? { enum: field.options } : { type: ['string', 'number', 'boolean'] };
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

function toResult(errors: ValidationError[]): ValidationResult {
  const missingFields: string[] = [];
  const invalidFields: string[] = [];
  const hiddenFields: string[] = [];

  for (const error of errors) {
    switch (error.kind) {
      case 'MissingRequired':
        missingFields.push(error.path);
        break;
      case 'TypeMismatch':
        invalidFields.push(error.path);
        break;
      case 'SetWhileHidden':
        hiddenFields.push(error.path);
        break;
      case 'UnknownPath':
        break;
    }
  }

  return {
    valid: errors.every((error) => error.kind === 'SetWhileHidden'),
    errors,
    missingFields,
    invalidFields,
    hiddenFields,
  };
}

let defaultValidator: Validator | undefined;

/**
 * Validate with default configuration.
 */
export function validate(config: ConfigurationObject, schema: UnitSchema): ValidationResult {
  defaultValidator ??= new Validator();
  return defaultValidator.validate(config, schema);
}

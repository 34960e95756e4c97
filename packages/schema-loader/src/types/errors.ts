/**
 * Schema Loader Error Types
 *
 * Specialized error classes for definitions that cannot become a UnitSchema.
 * Loading aborts on the first definition that fails; every issue found in
 * that definition is reported at once.
 */

import { ParserError } from './parser';

/**
 * Schema-authoring defects found while loading a definition.
 */
export type SchemaIssueKind =
  | 'InvalidDefinition'
  | 'InvalidPath'
  | 'DuplicatePath'
  | 'UnknownPath'
  | 'EmptyRuleSet'
  | 'EmptyAllowedValues'
  | 'MissingEnumOptions'
  | 'FamilyMismatch'
  | 'ConflictingRule'
  | 'InvalidDiscriminator'
  | 'NonExhaustiveDiscriminator';

export interface SchemaIssue {
  /** Path of the field, family or discriminator the issue was found on */
  path: string;
  kind: SchemaIssueKind;
  message: string;
}

/**
 * Error thrown when a definition breaks one or more schema invariants
 */
export class SchemaValidationError extends ParserError {
  constructor(
    message: string,
    public readonly issues: readonly SchemaIssue[],
    context?: Record<string, unknown>
  ) {
    super(message, undefined, { ...context, issueCount: issues.length });
    this.name = 'SchemaValidationError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaValidationError);
    }
  }
}

/**
 * Error thrown when a JSON Schema feature has no UnitSchema equivalent
 */
export class UnsupportedFeatureError extends ParserError {
  constructor(
    /**
     * The name of the unsupported feature (e.g., "$ref", "allOf")
     */
    public readonly feature: string,
    /**
     * What to do instead
     */
    public readonly reason: string,
    context?: Record<string, unknown>
  ) {
    super(`Unsupported feature: ${feature}. ${reason}`, undefined, context);
    this.name = 'UnsupportedFeatureError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnsupportedFeatureError);
    }
  }
}

export type UnsupportedKeyword = '$ref' | 'allOf' | 'anyOf' | 'oneOf' | 'not';

export function createUnsupportedFeatureError(
  feature: UnsupportedKeyword,
  context?: Record<string, unknown>
): UnsupportedFeatureError {
  const messages: Record<UnsupportedKeyword, string> = {
    $ref:
      'Schema references ($ref) cannot be turned into field paths. ' +
      'Inline the referenced schema.',
    allOf:
      'Schema composition with allOf is not supported. ' +
      'Merge the schemas into one properties block.',
    anyOf:
      'Union schemas (anyOf) are not supported. ' +
      'Model the variants with a discriminator and x-displayOptions.',
    oneOf:
      'Exclusive schemas (oneOf) are not supported. ' +
      'Model the variants with a discriminator and x-displayOptions.',
    not:
      'Schema negation (not) is not supported. ' +
      'Use an x-displayOptions hide rule instead.',
  };

  return new UnsupportedFeatureError(feature, messages[feature], context);
}

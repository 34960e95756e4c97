/**
 * fieldgate
 *
 * Decides which fields of a unit configuration are visible and required,
 * repairs operator-dependent field shapes, and validates the result.
 */

export { UnitEngine, createUnitEngineFromEnv } from './engine';
export { loadEngineConfig, type EngineConfig, type EngineEnv } from './config';
export { Validator, validate, type ValidatorConfig } from './core/validator';
export { Normalizer, getNormalizer, normalize } from './core/normalizer';
export {
  FIXUP_STRATEGIES,
  DEFAULT_BINARY_OPERATORS,
  DEFAULT_UNARY_OPERATORS,
  createFixup,
  type Fixup,
  type FixupContext,
  type FixupFactory,
} from './core/fixups';
export { EngineConfigError, UnsupportedFamilyError } from './core/errors';
export type { NormalizationResult, ValidationResult } from './types';

export * from '@fieldgate/shared';
export {
  ParserError,
  SchemaValidationError,
  UnsupportedFeatureError,
  UnitDefinitionParser,
  JSONSchemaParser,
  parseUnitDefinition,
  parseJSONSchema,
  loadUnitSchemaFromFile,
  defineDiscriminator,
  type ParserOptions,
  type SchemaIssue,
  type SchemaIssueKind,
  type UnitDefinition,
  type JSONSchema,
} from '@fieldgate/schema-loader';

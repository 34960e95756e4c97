/**
 * @fieldgate/schema-loader
 *
 * Schema supply for the fieldgate engine: converts catalog unit definitions and
 * JSON Schema documents into the immutable UnitSchema the engine resolves
 * against. Malformed definitions abort loading; the engine never sees them.
 */

// =============================================================================
// Parser Interface & Base Types
// =============================================================================

export type { Parser, ParserOptions } from './types/parser';
export { ParserError, isParser } from './types/parser';

// =============================================================================
// Error Classes
// =============================================================================

export {
  SchemaValidationError,
  UnsupportedFeatureError,
  createUnsupportedFeatureError,
  type SchemaIssue,
  type SchemaIssueKind,
  type UnsupportedKeyword,
} from './types/errors';

// =============================================================================
// Definition Formats
// =============================================================================

export {
  UnitDefinitionSchema,
  type UnitDefinition,
  type ParsedUnitDefinition,
  type FieldDefinitionInput,
  type DiscriminatorDefinition,
} from './schemas/unit-definition';

// =============================================================================
// Parsers - Convert definitions to UnitSchema
// =============================================================================

export {
  UnitDefinitionParser,
  parseUnitDefinition,
  loadUnitSchemaFromFile,
} from './parsers/unit-definition-parser';

export {
  JSONSchemaParser,
  parseJSONSchema,
  type JSONSchema,
  type JSONSchemaType,
  type JSONSchemaParserOptions,
} from './parsers/json-schema-parser';

// =============================================================================
// Building Blocks
// =============================================================================

export { buildUnitSchema, type SchemaDraft } from './core/schema-builder';
export { defineDiscriminator } from './core/discriminator';

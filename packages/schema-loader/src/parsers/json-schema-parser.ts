/**
 * JSON Schema Parser
 *
 * Converts object-typed JSON Schema documents (draft-07 and draft-2020-12) into
 * a UnitSchema. Nested object properties become dotted field paths; arrays
 * become a single `array` field, since their length is not known up front.
 *
 * Engine metadata rides on extension keywords:
 * - `x-displayOptions`: `{ show?, hide? }` on any property
 * - `x-familyTag`: family membership of a property
 * - `x-families`: family definitions, on the root
 */

import type {
  FamilyDefinition,
  FieldDefinition,
  FieldKind,
  RuleLiteral,
  UnitSchema,
} from '@fieldgate/shared';
import { buildUnitSchema, DEFAULT_PARSER_OPTIONS } from '../core/schema-builder';
import {
  DisplayOptionsSchema,
  FamilyDefinitionSchema,
  FamilyTagSchema,
} from '../schemas/unit-definition';
import { createUnsupportedFeatureError } from '../types/errors';
import { ParserError, type Parser, type ParserOptions } from '../types/parser';

/**
 * JSON Schema type definitions
 * Supports both draft-07 and draft-2020-12 schemas
 */
export interface JSONSchema {
  type?: JSONSchemaType | JSONSchemaType[];

  // Metadata
  title?: string;
  description?: string;
  default?: unknown;

  // Object properties
  properties?: Record<string, JSONSchema>;
  required?: string[];

  // Arrays
  items?: JSONSchema | JSONSchema[];

  enum?: (string | number | boolean | null)[];

  // Unsupported features
  $ref?: string;
  allOf?: JSONSchema[];
  anyOf?: JSONSchema[];
  oneOf?: JSONSchema[];
  not?: JSONSchema;

  $id?: string;
  $schema?: string;

  // Extensions
  'x-displayOptions'?: unknown;
  'x-familyTag'?: unknown;
  'x-families'?: unknown;

  // Additional properties
  [key: string]: unknown;
}

export type JSONSchemaType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'null'
  | 'object'
  | 'array';

export interface JSONSchemaParserOptions extends ParserOptions {
  /** Unit type for the schema; falls back to `$id`, then `title` */
  unitType?: string;
}

/**
 * JSON Schema Parser implementation
 *
 * A property is required when it is listed in its parent's `required` and
 * every enclosing object is itself required, so a required child of an
 * optional object is not reported missing while the object is absent.
 */
export class JSONSchemaParser implements Parser<JSONSchema> {
  private readonly options: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
  }

  /**
   * Parse a JSON Schema document into a UnitSchema
   */
  parse(input: JSONSchema, options: JSONSchemaParserOptions = {}): UnitSchema {
    const { unitType: explicitUnitType, ...parserOptions } = options;

    if (!input || typeof input !== 'object') {
      throw new ParserError('Invalid JSON Schema: expected an object', input);
    }

    this.validateNoUnsupportedFeatures(input);
    if (input.type !== 'object' || !input.properties) {
      throw new ParserError(
        'JSON Schema root must be an object type with properties',
        undefined,
        { type: input.type }
      );
    }

    const unitType = explicitUnitType ?? input.$id ?? input.title;
    if (!unitType) {
      throw new ParserError('Cannot determine the unit type: pass unitType or set $id or title');
    }

    const fields: FieldDefinition[] = [];
    this.collectProperties(input, '', true, fields);

    return buildUnitSchema(
      {
        unitType,
        ...(input.title !== undefined ? { displayName: input.title } : {}),
        fields,
        families: this.parseFamilies(input['x-families']),
        discriminators: [],
      },
      { ...this.options, ...parserOptions }
    );
  }

  /**
   * Check if a value can be parsed as an object JSON Schema
   */
  canParse(input: unknown): input is JSONSchema {
    if (!input || typeof input !== 'object' || !('type' in input)) {
      return false;
    }
    return input.type === 'object' && 'properties' in input;
  }

  /**
   * Emit a field for each property, recursing into nested objects
   */
  private collectProperties(
    schema: JSONSchema,
    prefix: string,
    parentRequired: boolean,
    out: FieldDefinition[]
  ): void {
    const required = schema.required ?? [];

    for (const [name, property] of Object.entries(schema.properties ?? {})) {
      const path = prefix ? `${prefix}.${name}` : name;
      const isRequired = parentRequired && required.includes(name);

      out.push(this.parseField(property, path, isRequired));

      if (property.type === 'object' && property.properties) {
        this.collectProperties(property, path, isRequired, out);
      }
    }
  }

  private parseField(schema: JSONSchema, path: string, isRequired: boolean): FieldDefinition {
    this.validateNoUnsupportedFeatures(schema);

    const kind = this.parseKind(schema, path);
    const field: FieldDefinition = {
      path,
      kind,
      requiredWhenVisible: isRequired,
      ...(kind === 'enum' ? { options: this.parseEnumOptions(schema, path) } : {}),
      ...this.parseExtensions(schema, path),
      ...(schema.title !== undefined ? { displayName: schema.title } : {}),
      ...(schema.description !== undefined ? { description: schema.description } : {}),
      // The published schema is frozen; the caller's default value is not
      ...(schema.default !== undefined ? { default: structuredClone(schema.default) } : {}),
    };

    return field;
  }

  private parseKind(schema: JSONSchema, path: string): FieldKind {
    // Handle enum first (can be present alongside type)
    if (schema.enum !== undefined) {
      return 'enum';
    }

    if (Array.isArray(schema.type)) {
      throw new ParserError('Union types (array of types) are not supported', undefined, {
        path,
        types: schema.type,
      });
    }

    switch (schema.type) {
      case 'string':
        return 'string';
      case 'number':
      case 'integer':
        return 'number';
      case 'boolean':
        return 'boolean';
      case 'object':
        return 'object';
      case 'array':
        if (Array.isArray(schema.items)) {
          throw new ParserError('Tuple validation (items as array) is not supported', undefined, {
            path,
          });
        }
        return 'array';
      case undefined:
        throw new ParserError('JSON Schema property must have a "type" property', undefined, {
          path,
        });
      default:
        throw new ParserError(`Unsupported JSON Schema type: ${schema.type}`, undefined, {
          path,
          type: schema.type,
        });
    }
  }

  private parseEnumOptions(schema: JSONSchema, path: string): RuleLiteral[] {
    const values = schema.enum ?? [];
    if (values.length === 0) {
      throw new ParserError('Enum field must have a non-empty "enum" array', undefined, { path });
    }

    // null cannot be stored as a value (it reads as NotFound), so it is dropped
    return values.filter((value): value is RuleLiteral => value !== null);
  }

  private parseExtensions(
    schema: JSONSchema,
    path: string
  ): Pick<FieldDefinition, 'visibilityRule' | 'familyTag'> {
    const familyTag = this.parseFamilyTag(schema, path);
    if (schema['x-displayOptions'] === undefined) return familyTag;

    const parsed = DisplayOptionsSchema.safeParse(schema['x-displayOptions']);
    if (!parsed.success) {
      throw new ParserError(`Invalid x-displayOptions on '${path}'`, parsed.error, { path });
    }
    return { visibilityRule: parsed.data, ...familyTag };
  }

  private parseFamilyTag(schema: JSONSchema, path: string): Pick<FieldDefinition, 'familyTag'> {
    if (schema['x-familyTag'] === undefined) return {};

    const parsed = FamilyTagSchema.safeParse(schema['x-familyTag']);
    if (!parsed.success) {
      throw new ParserError(`Unknown x-familyTag on '${path}'`, parsed.error, {
        path,
        familyTag: schema['x-familyTag'],
      });
    }
    return { familyTag: parsed.data };
  }

  private parseFamilies(raw: unknown): FamilyDefinition[] {
    if (raw === undefined) return [];

    const parsed = FamilyDefinitionSchema.array().safeParse(raw);
    if (!parsed.success) {
      throw new ParserError('Invalid x-families', parsed.error);
    }
    return parsed.data;
  }

  /**
   * Validate that a schema does not contain unsupported features
   *
   * - $ref: Schema references
   * - allOf: Schema composition with AND logic
   * - anyOf: Schema composition with OR logic (union types)
   * - oneOf: Schema composition with XOR logic (discriminated unions)
   * - not: Schema negation
   */
  private validateNoUnsupportedFeatures(schema: JSONSchema): void {
    if (schema.$ref !== undefined) {
      throw createUnsupportedFeatureError('$ref', { $ref: schema.$ref });
    }

    if (schema.allOf !== undefined) {
      throw createUnsupportedFeatureError('allOf', { schemasCount: schema.allOf.length });
    }

    if (schema.anyOf !== undefined) {
      throw createUnsupportedFeatureError('anyOf', { schemasCount: schema.anyOf.length });
    }

    if (schema.oneOf !== undefined) {
      throw createUnsupportedFeatureError('oneOf', { schemasCount: schema.oneOf.length });
    }

    if (schema.not !== undefined) {
      throw createUnsupportedFeatureError('not', { not: schema.not });
    }
  }
}

/**
 * Convenience function to parse a JSON Schema document
 */
export function parseJSONSchema(
  schema: JSONSchema,
  options?: JSONSchemaParserOptions
): UnitSchema {
  return new JSONSchemaParser(options).parse(schema, options);
}

/**
 * Unit Definition Parser
 *
 * Converts catalog unit definitions (the JSON an integration catalog ships per
 * unit type) into a UnitSchema. The catalog format names the static
 * requirement flag `required` and the visibility rule `displayOptions`.
 */

import { readFile } from 'node:fs/promises';
import type { FieldDefinition, UnitSchema } from '@fieldgate/shared';
import type { ZodIssue } from 'zod';
import { buildUnitSchema, DEFAULT_PARSER_OPTIONS } from '../core/schema-builder';
import {
  UnitDefinitionSchema,
  type ParsedUnitDefinition,
  type UnitDefinition,
} from '../schemas/unit-definition';
import { SchemaValidationError, type SchemaIssue } from '../types/errors';
import { ParserError, type Parser, type ParserOptions } from '../types/parser';

export class UnitDefinitionParser implements Parser<UnitDefinition> {
  private readonly options: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
  }

  /**
   * Parse a catalog definition into a frozen UnitSchema
   */
  parse(input: UnitDefinition, options?: ParserOptions): UnitSchema {
    const mergedOptions = { ...this.options, ...options };

    if (!input || typeof input !== 'object') {
      throw new ParserError('Invalid unit definition: expected an object', input);
    }

    const result = UnitDefinitionSchema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues.map(toSchemaIssue);
      throw new SchemaValidationError(
        `Unit definition is malformed: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
        issues,
        { cause: result.error.message }
      );
    }

    return buildUnitSchema(
      {
        unitType: result.data.unitType,
        version: result.data.version,
        displayName: result.data.displayName,
        fields: result.data.fields.map(toFieldDefinition),
        families: result.data.families,
        discriminators: result.data.discriminators,
      },
      mergedOptions
    );
  }

  canParse(input: unknown): boolean {
    return UnitDefinitionSchema.safeParse(input).success;
  }
}

function toFieldDefinition(raw: ParsedUnitDefinition['fields'][number]): FieldDefinition {
  return {
    path: raw.path,
    kind: raw.kind,
    requiredWhenVisible: raw.required,
    ...(raw.displayOptions !== undefined ? { visibilityRule: raw.displayOptions } : {}),
    ...(raw.familyTag !== undefined ? { familyTag: raw.familyTag } : {}),
    ...(raw.options !== undefined ? { options: raw.options } : {}),
    ...(raw.displayName !== undefined ? { displayName: raw.displayName } : {}),
    ...(raw.description !== undefined ? { description: raw.description } : {}),
    ...(raw.default !== undefined ? { default: structuredClone(raw.default) } : {}),
  };
}

function toSchemaIssue(issue: ZodIssue): SchemaIssue {
  return {
    path: issue.path.join('.') || '(root)',
    kind: 'InvalidDefinition',
    message: issue.message,
  };
}

/**
 * Convenience function to parse a catalog definition
 */
export function parseUnitDefinition(input: UnitDefinition, options?: ParserOptions): UnitSchema {
  return new UnitDefinitionParser(options).parse(input);
}

/**
 * Read a catalog definition from a JSON file and parse it
 */
export async function loadUnitSchemaFromFile(
  filePath: string,
  options?: ParserOptions
): Promise<UnitSchema> {
  const text = await readFile(filePath, 'utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ParserError(`Unit definition file is not valid JSON: ${filePath}`, error, { filePath });
  }

  const result = UnitDefinitionSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaValidationError(
      `Unit definition file is malformed: ${filePath}`,
      result.error.issues.map(toSchemaIssue),
      { filePath }
    );
  }
  return new UnitDefinitionParser(options).parse(result.data);
}

/**
 * Parser Interface
 *
 * Base interface for all unit schema parsers (catalog definitions, JSON Schema).
 * Each parser implementation converts its source format into an immutable UnitSchema.
 */

import type { UnitSchema } from '@fieldgate/shared';

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /**
   * Strict mode - every discriminator option must be listed in its activation map
   * @default true
   */
  strict?: boolean;

  /**
   * Log a warning when field rules reference each other in a cycle
   * @default true
   */
  warnOnCycles?: boolean;
}

/**
 * Parser error thrown when a schema cannot be parsed
 */
export class ParserError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ParserError';

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ParserError);
    }
  }
}

/**
 * Base Parser interface
 *
 * @template TInput - The input definition type (e.g., UnitDefinition, JSONSchema)
 */
export interface Parser<TInput = unknown> {
  /**
   * Parse a definition into a UnitSchema
   *
   * @throws {ParserError} If the definition is malformed
   * @throws {SchemaValidationError} If the definition parses but breaks a schema invariant
   */
  parse(input: TInput, options?: ParserOptions): UnitSchema;

  /**
   * Cheap structural check, without running the full set of invariants
   */
  canParse(input: unknown): boolean;
}

/**
 * Type guard: check if an object implements the Parser interface
 */
export function isParser<TInput = unknown>(obj: unknown): obj is Parser<TInput> {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'parse' in obj &&
    typeof obj.parse === 'function' &&
    'canParse' in obj &&
    typeof obj.canParse === 'function'
  );
}

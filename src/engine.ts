/**
 * UnitEngine - one schema bound to a prebuilt Normalizer and Validator.
 */

import {
  explainVisibility,
  resolveSchema,
  type ConfigurationObject,
  type SchemaResolution,
  type UnitSchema,
  type VisibilityExplanation,
} from '@fieldgate/shared';
import { loadEngineConfig, type EngineConfig, type EngineEnv } from './config';
import { Normalizer } from './core/normalizer';
import { Validator } from './core/validator';
import type { ValidationResult } from './types';

export class UnitEngine {
  private readonly normalizer: Normalizer;
  private readonly validator: Validator;

  /**
   * @throws UnsupportedFamilyError when the schema declares a family without a fixup
   */
  constructor(
    readonly schema: UnitSchema,
    config: EngineConfig = {}
  ) {
    this.normalizer = new Normalizer(schema);
    this.validator = new Validator(config);
  }

  /** Visibility and requirement sets for the caller's configuration */
  resolve(config: ConfigurationObject): SchemaResolution {
    return resolveSchema(config, this.schema);
  }

  /** Per-rule outcomes behind each field's visibility, in declaration order */
  explain(config: ConfigurationObject): VisibilityExplanation[] {
    return this.schema.fields.map((field) => explainVisibility(config, field));
  }

  /** Effective configuration; the caller's object is left untouched */
  normalize(config: ConfigurationObject): ConfigurationObject {
    return this.normalizer.normalize(config).config;
  }

  validate(config: ConfigurationObject): ValidationResult {
    return this.validator.validate(config, this.schema, this.normalizer);
  }
}

/**
 * Create a UnitEngine configured from environment variables.
 */
export function createUnitEngineFromEnv(
  schema: UnitSchema,
  env: EngineEnv = process.env
): UnitEngine {
  return new UnitEngine(schema, loadEngineConfig(env));
}

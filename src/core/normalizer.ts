/**
 * Normalizer - family-specific structural repair of a configuration
 *
 * Runs every fixup declared by the schema's families against the effective
 * configuration. Visibility comes from the caller's configuration and is
 * never recomputed after a fixup. The caller's object is never mutated.
 */

import {
  resolveVisibility,
  type ConfigurationObject,
  type UnitSchema,
  type VisibilitySet,
} from '@fieldgate/shared';
import type { NormalizationResult } from '../types';
import { createFixup, unchanged, type Fixup } from './fixups';

/**
 * Normalizer bound to one schema. Fixups are instantiated once, when the
 * Normalizer is built; an unknown family tag throws UnsupportedFamilyError.
 */
export class Normalizer {
  private readonly fixups: readonly Fixup[];

  constructor(readonly schema: UnitSchema) {
    this.fixups = (schema.families ?? []).map((family) => createFixup(family, schema.unitType));
  }

  /**
   * Apply every fixup in family declaration order.
   *
   * @param visibility - Defaults to the visibility of `config` itself
   */
  normalize(
    config: ConfigurationObject,
    visibility: VisibilitySet = resolveVisibility(config, this.schema)
  ): NormalizationResult {
    const result = unchanged(config);

    for (const fixup of this.fixups) {
      const step = fixup(result.config, { visibility });
      result.config = step.config;
      result.suppressedPaths.push(...step.suppressedPaths);
      result.injectedPaths.push(...step.injectedPaths);
      result.removedPaths.push(...step.removedPaths);
    }

    return result;
  }
}

const normalizers = new WeakMap<UnitSchema, Normalizer>();

/**
 * Shared Normalizer for a schema. Safe to memoize: it depends only on the
 * immutable schema.
 */
export function getNormalizer(schema: UnitSchema): Normalizer {
  let normalizer = normalizers.get(schema);
  if (!normalizer) {
    normalizer = new Normalizer(schema);
    normalizers.set(schema, normalizer);
  }
  return normalizer;
}

/**
 * Effective configuration for `config`. Idempotent:
 * normalize(normalize(c)) deep-equals normalize(c).
 */
export function normalize(
  config: ConfigurationObject,
  schema: UnitSchema,
  visibility?: VisibilitySet
): ConfigurationObject {
  return getNormalizer(schema).normalize(config, visibility).config;
}

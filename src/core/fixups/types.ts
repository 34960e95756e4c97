import type { ConfigurationObject, FamilyDefinition, VisibilitySet } from '@fieldgate/shared';
import type { NormalizationResult } from '../../types';

export interface FixupContext {
  /** Visibility resolved from the caller's configuration */
  readonly visibility: VisibilitySet;
}

/**
 * Pure structural repair of one family instance. Must be idempotent.
 */
export type Fixup = (config: ConfigurationObject, context: FixupContext) => NormalizationResult;

export type FixupFactory<F extends FamilyDefinition> = (family: F) => Fixup;

export function unchanged(config: ConfigurationObject): NormalizationResult {
  return { config, suppressedPaths: [], injectedPaths: [], removedPaths: [] };
}

/**
 * fieldgate engine result types
 *
 * The data model (schemas, rules, visibility sets) lives in @fieldgate/shared;
 * these are the shapes produced by normalization and validation.
 */

import type { ConfigurationObject, ValidationError } from '@fieldgate/shared';

// =============================================================================
// § Normalization
// =============================================================================

/**
 * Effective configuration plus a record of what the fixups did.
 */
export interface NormalizationResult {
  /** The caller's object when nothing changed, otherwise a copy */
  config: ConfigurationObject;
  /** Paths declared irrelevant for the current discriminator value */
  suppressedPaths: string[];
  /** Paths holding a value the Normalizer maintains (companion flags) */
  injectedPaths: string[];
  /** Paths whose stored value the Normalizer removed */
  removedPaths: string[];
}

// =============================================================================
// § Validation
// =============================================================================

/**
 * Validation result containing every finding for one configuration.
 */
export interface ValidationResult {
  /** No MissingRequired and no TypeMismatch findings */
  valid: boolean;
  /** Findings in field declaration order */
  errors: ValidationError[];
  /** Paths with a MissingRequired finding */
  missingFields: string[];
  /** Paths with a TypeMismatch finding */
  invalidFields: string[];
  /** Paths with a SetWhileHidden finding */
  hiddenFields: string[];
}

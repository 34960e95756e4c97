/**
 * fieldgate data model
 *
 * Schema-time types (FieldDefinition, RuleSet, FamilyDefinition, UnitSchema) are
 * constants: loaded once, never mutated, shared by every resolution.
 * Resolution-time types (VisibilitySet, RequirementSet, ValidationResult) are
 * created fresh for each call.
 */

// =============================================================================
// § Fields
// =============================================================================

/**
 * Primitive type tag of a field's value.
 */
export const FIELD_KINDS = ['string', 'number', 'boolean', 'object', 'array', 'enum'] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

/**
 * Literal a rule can compare a stored value against.
 */
export type RuleLiteral = string | number | boolean;

/**
 * Conjunction of disjunctions: every path must resolve to one of its listed values.
 *
 * Keys are dotted paths into the configuration, values the non-empty list of
 * accepted literals. Insertion order is preserved for diagnostics.
 */
export type RuleSet = Readonly<Record<string, readonly RuleLiteral[]>>;

/**
 * `show` gates a field, `hide` vetoes it.
 */
export interface VisibilityRule {
  readonly show?: RuleSet;
  readonly hide?: RuleSet;
}

/**
 * Tags of the Normalizer routines. The set is closed: adding a family means
 * adding a tag here and a strategy to the fixup table.
 */
export const FAMILY_TAGS = ['comparison-operator'] as const;

export type FamilyTag = (typeof FAMILY_TAGS)[number];

export interface FieldDefinition {
  /** Dotted address within the configuration, unique per schema */
  readonly path: string;
  readonly kind: FieldKind;
  /** Static flag; the field is required only while it is visible */
  readonly requiredWhenVisible: boolean;
  readonly visibilityRule?: VisibilityRule;
  readonly familyTag?: FamilyTag;
  /** Allowed members for `enum` fields */
  readonly options?: readonly RuleLiteral[];
  readonly displayName?: string;
  readonly description?: string;
  /** Documentation only; the engine never injects defaults */
  readonly default?: unknown;
}

// =============================================================================
// § Families
// =============================================================================

/**
 * An operator choice that decides whether a second operand applies.
 */
export interface ComparisonOperatorFamily {
  readonly tag: 'comparison-operator';
  /** Discriminator field holding the operator name */
  readonly operatorPath: string;
  /** Operand that only binary operators use */
  readonly secondOperandPath: string;
  /** Companion boolean recording the single-operand form */
  readonly singleValueFlagPath?: string;
  /** Overrides the built-in unary operator table */
  readonly unaryOperators?: readonly string[];
  /** Overrides the built-in binary operator table */
  readonly binaryOperators?: readonly string[];
}

export type FamilyDefinition = ComparisonOperatorFamily;

// =============================================================================
// § Schema
// =============================================================================

export interface UnitSchema {
  readonly unitType: string;
  readonly version?: number;
  readonly displayName?: string;
  /** Declaration order is the order of every result */
  readonly fields: readonly FieldDefinition[];
  readonly families?: readonly FamilyDefinition[];
}

/**
 * Caller-supplied candidate configuration.
 */
export type ConfigurationObject = Record<string, unknown>;

// =============================================================================
// § Resolution results
// =============================================================================

/** Field path -> visible, total over the schema, in declaration order */
export type VisibilitySet = ReadonlyMap<string, boolean>;

/** Paths that are visible and required */
export type RequirementSet = ReadonlySet<string>;

export interface SchemaResolution {
  visibility: VisibilitySet;
  required: RequirementSet;
}

// =============================================================================
// § Validation findings
// =============================================================================

export type ValidationErrorKind =
  | 'MissingRequired'
  | 'TypeMismatch'
  | 'SetWhileHidden'
  | 'UnknownPath';

export interface ValidationError {
  path: string;
  kind: ValidationErrorKind;
  message: string;
  expected?: unknown;
  received?: unknown;
}

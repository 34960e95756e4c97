/**
 * @fieldgate/shared - Isomorphic visibility resolution shared by the engine,
 * the schema loader and any editing surface.
 *
 * Zero-dependency modules for path lookups, rule evaluation and
 * field/schema visibility. Safe to use in both Node.js and browser environments.
 */

export {
  type FieldKind,
  type RuleLiteral,
  type RuleSet,
  type VisibilityRule,
  type FamilyTag,
  type FieldDefinition,
  type ComparisonOperatorFamily,
  type FamilyDefinition,
  type UnitSchema,
  type ConfigurationObject,
  type VisibilitySet,
  type RequirementSet,
  type SchemaResolution,
  type ValidationErrorKind,
  type ValidationError,
  FIELD_KINDS,
  FAMILY_TAGS,
} from './types';

export {
  type PathSegment,
  type PathLookup,
  isRecord,
  parsePath,
  isValidPath,
  resolvePath,
  getFieldValue,
  hasPath,
  setPathValue,
  deletePathValue,
} from './core/path-resolver';

export {
  type RuleEntryOutcome,
  evaluateRuleEntries,
  matches,
  ruleSetPaths,
} from './core/rule-evaluator';

export {
  type VisibilityExplanation,
  explainVisibility,
  isVisible,
} from './core/field-resolver';

export {
  resolveVisibility,
  resolveRequirements,
  resolveSchema,
  getVisibleFields,
  detectCircularRules,
  findUnknownRuleReferences,
  type UnknownRuleReference,
} from './core/schema-resolver';

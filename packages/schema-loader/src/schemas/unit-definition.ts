/**
 * Unit Definition Zod Schemas
 * Runtime validation of catalog definitions before they become a UnitSchema.
 */

import { z } from 'zod';
import { FAMILY_TAGS, FIELD_KINDS } from '@fieldgate/shared';

// =============================================================================
// § Rules
// =============================================================================

export const RuleLiteralSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Dependency path -> accepted values. Emptiness is checked after parsing so
 * it is reported as a schema issue with the owning field's path.
 */
export const RuleSetSchema = z.record(z.string(), z.array(RuleLiteralSchema));

export const DisplayOptionsSchema = z
  .object({
    show: RuleSetSchema.optional(),
    hide: RuleSetSchema.optional(),
  })
  .strict();

// =============================================================================
// § Fields
// =============================================================================

export const FieldKindSchema = z.enum(FIELD_KINDS);

export const FamilyTagSchema = z.enum(FAMILY_TAGS);

export const FieldDefinitionSchema = z
  .object({
    path: z.string(),
    kind: FieldKindSchema,
    required: z.boolean().default(false),
    displayOptions: DisplayOptionsSchema.optional(),
    familyTag: FamilyTagSchema.optional(),
    options: z.array(RuleLiteralSchema).optional(),
    displayName: z.string().optional(),
    description: z.string().optional(),
    default: z.unknown().optional(),
  })
  .strict();

// =============================================================================
// § Families
// =============================================================================

export const ComparisonOperatorFamilySchema = z
  .object({
    tag: z.literal('comparison-operator'),
    operatorPath: z.string(),
    secondOperandPath: z.string(),
    singleValueFlagPath: z.string().optional(),
    unaryOperators: z.array(z.string()).optional(),
    binaryOperators: z.array(z.string()).optional(),
  })
  .strict();

export const FamilyDefinitionSchema = z.discriminatedUnion('tag', [ComparisonOperatorFamilySchema]);

// =============================================================================
// § Discriminators
// =============================================================================

/**
 * Discriminator value -> field paths it activates.
 */
export const DiscriminatorDefinitionSchema = z
  .object({
    path: z.string(),
    activates: z.record(z.string(), z.array(z.string())),
  })
  .strict();

// =============================================================================
// § Unit
// =============================================================================

export const UnitDefinitionSchema = z
  .object({
    unitType: z.string().min(1),
    version: z.number().int().positive().optional(),
    displayName: z.string().optional(),
    fields: z.array(FieldDefinitionSchema).min(1),
    families: z.array(FamilyDefinitionSchema).default([]),
    discriminators: z.array(DiscriminatorDefinitionSchema).default([]),
  })
  .strict();

/** Catalog definition as authored */
export type UnitDefinition = z.input<typeof UnitDefinitionSchema>;
/** Catalog definition after defaults are applied */
export type ParsedUnitDefinition = z.output<typeof UnitDefinitionSchema>;
export type FieldDefinitionInput = z.input<typeof FieldDefinitionSchema>;
export type DiscriminatorDefinition = z.output<typeof DiscriminatorDefinitionSchema>;

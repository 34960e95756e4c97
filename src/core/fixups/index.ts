/**
 * Fixup registry
 *
 * Closed table of normalization strategies, one per family tag. Adding a
 * family means adding its tag to FamilyTag and its factory here; the mapped
 * type makes a missing entry a compile error.
 */

import type { FamilyDefinition, FamilyTag } from '@fieldgate/shared';
import { UnsupportedFamilyError } from '../errors';
import { createComparisonOperatorFixup } from './comparison-operator';
import type { Fixup, FixupFactory } from './types';

type FamilyOf<T extends FamilyTag> = Extract<FamilyDefinition, { tag: T }>;

export const FIXUP_STRATEGIES: { readonly [T in FamilyTag]: FixupFactory<FamilyOf<T>> } = {
  'comparison-operator': createComparisonOperatorFixup,
};

export function createFixup(family: FamilyDefinition, unitType: string): Fixup {
  switch (family.tag) {
    case 'comparison-operator':
      return FIXUP_STRATEGIES['comparison-operator'](family);
    default:
      // Reachable only for schemas built outside the loader
      return unsupportedFamily(family, unitType);
  }
}

function unsupportedFamily(family: { readonly tag: string }, unitType: string): never {
  throw new UnsupportedFamilyError(family.tag, unitType);
}

export { unchanged } from './types';
export type { Fixup, FixupContext, FixupFactory } from './types';
export { DEFAULT_BINARY_OPERATORS, DEFAULT_UNARY_OPERATORS } from './comparison-operator';

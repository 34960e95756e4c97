/**
 * Comparison operator fixup.
 *
 * A unary operator (isEmpty, exists, ...) takes one operand: the second
 * operand is dropped and never reported missing, and the companion
 * single-value flag is set. A binary operator drops the flag again.
 * Operators in neither table are left alone; an enum operator field
 * reports them as a TypeMismatch.
 */

import {
  deletePathValue,
  getFieldValue,
  hasPath,
  resolvePath,
  setPathValue,
  type ComparisonOperatorFamily,
} from '@fieldgate/shared';
import { unchanged, type Fixup } from './types';

export const DEFAULT_UNARY_OPERATORS: readonly string[] = [
  'isEmpty',
  'isNotEmpty',
  'exists',
  'notExists',
  'isTrue',
  'isFalse',
];

export const DEFAULT_BINARY_OPERATORS: readonly string[] = [
  'equals',
  'notEquals',
  'contains',
  'notContains',
  'startsWith',
  'endsWith',
  'regex',
  'notRegex',
  'larger',
  'largerEqual',
  'smaller',
  'smallerEqual',
  'before',
  'after',
];

export function createComparisonOperatorFixup(family: ComparisonOperatorFamily): Fixup {
  const unary = new Set(family.unaryOperators ?? DEFAULT_UNARY_OPERATORS);
  const binary = new Set(family.binaryOperators ?? DEFAULT_BINARY_OPERATORS);
  const flagPath = family.singleValueFlagPath;

  return (config, { visibility }) => {
    // A hidden operator is stale data; its family is not repaired
    if (visibility.get(family.operatorPath) !== true) return unchanged(config);

    const operator = resolvePath(config, family.operatorPath);
    if (!operator.found || typeof operator.value !== 'string') return unchanged(config);

    if (unary.has(operator.value)) {
      const result = unchanged(config);
      result.suppressedPaths.push(family.secondOperandPath);

      if (hasPath(result.config, family.secondOperandPath)) {
        result.config = deletePathValue(result.config, family.secondOperandPath);
        result.removedPaths.push(family.secondOperandPath);
      }
      if (flagPath !== undefined) {
        if (getFieldValue(result.config, flagPath) !== true) {
          result.config = setPathValue(result.config, flagPath, true);
        }
        if (getFieldValue(result.config, flagPath) === true) {
          result.injectedPaths.push(flagPath);
        }
      }
      return result;
    }

    if (binary.has(operator.value) && flagPath !== undefined && hasPath(config, flagPath)) {
      const result = unchanged(deletePathValue(config, flagPath));
      result.removedPaths.push(flagPath);
      return result;
    }

    return unchanged(config);
  };
}


import { describe, it, expect } from 'vitest';
import { loadEngineConfig } from '../src/config';
import { EngineConfigError } from '../src/core/errors';

describe('loadEngineConfig', () => {
  it('should return an empty config when nothing is set', () => {
    expect(loadEngineConfig({})).toEqual({});
  });

  it('should treat empty values as unset', () => {
    expect(loadEngineConfig({ FIELDGATE_REPORT_HIDDEN_VALUES: '', FIELDGATE_EXPRESSION_PREFIX: ' ' })).toEqual({});
  });

  it.each([
    { value: 'true', expected: true },
    { value: 'TRUE', expected: true },
    { value: '1', expected: true },
    { value: 'false', expected: false },
    { value: '0', expected: false },
  ])('should read FIELDGATE_REPORT_HIDDEN_VALUES=$value', ({ value, expected }) => {
    expect(loadEngineConfig({ FIELDGATE_REPORT_HIDDEN_VALUES: value })).toEqual({
      reportHiddenValues: expected,
    });
  });

  it('should read the expression prefix', () => {
    expect(loadEngineConfig({ FIELDGATE_EXPRESSION_PREFIX: '=' })).toEqual({ expressionPrefix: '=' });
  });

  it('should reject unsupported flag values', () => {
    let caught: unknown;
    try {
      loadEngineConfig({ FIELDGATE_REPORT_HIDDEN_VALUES: 'yes' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EngineConfigError);
    expect(caught).toMatchObject({
      name: 'EngineConfigError',
      variable: 'FIELDGATE_REPORT_HIDDEN_VALUES',
      message: 'Invalid value for FIELDGATE_REPORT_HIDDEN_VALUES: yes. Valid values: true, false, 1, 0',
    });
  });
});

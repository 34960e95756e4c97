/**
 * Tests for the core Validator class:
 * - Finding order and kinds
 * - Kind checks (object vs array, enum membership, expressions)
 * - Interaction with the Normalizer (suppressed and maintained paths)
 * - Hidden-value reporting switch
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { UnitSchema } from '@fieldgate/shared';
import { Validator, validate } from '../../src/core/validator';

const request: UnitSchema = {
  unitType: 'request',
  fields: [
    { path: 'method', kind: 'enum', requiredWhenVisible: true, options: ['GET', 'POST'] },
    { path: 'url', kind: 'string', requiredWhenVisible: true },
    { path: 'sendBody', kind: 'boolean', requiredWhenVisible: false },
    {
      path: 'body',
      kind: 'object',
      requiredWhenVisible: true,
      visibilityRule: { show: { sendBody: [true] }, hide: { method: ['GET'] } },
    },
    { path: 'headers', kind: 'array', requiredWhenVisible: false },
    { path: 'options.timeout', kind: 'number', requiredWhenVisible: false },
  ],
};

describe('Validator', () => {
  let validator: Validator;

  beforeEach(() => {
    validator = new Validator();
  });

  describe('required fields', () => {
    it('should report every missing required field in declaration order', () => {
      const result = validator.validate({ sendBody: true }, request);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        { path: 'method', kind: 'MissingRequired', message: "Field 'method' is required", expected: 'enum' },
        { path: 'url', kind: 'MissingRequired', message: "Field 'url' is required", expected: 'string' },
        { path: 'body', kind: 'MissingRequired', message: "Field 'body' is required", expected: 'object' },
      ]);
      expect(result.missingFields).toEqual(['method', 'url', 'body']);
    });

    it('should treat null as missing', () => {
      const result = validator.validate({ method: 'GET', url: null }, request);

      expect(result.missingFields).toEqual(['url']);
    });

    it('should not require hidden fields', () => {
      const result = validator.validate({ method: 'GET', url: '/users', sendBody: true }, request);

      expect(result).toEqual({
        valid: true,
        errors: [],
        missingFields: [],
        invalidFields: [],
        hiddenFields: [],
      });
    });
  });

  describe('kind checks', () => {
    it('should reject arrays for object fields', () => {
      const result = validator.validate(
        { method: 'POST', url: '/users', sendBody: true, body: [] },
        request
      );

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          path: 'body',
          kind: 'TypeMismatch',
          message: "Expected object for 'body', but received array",
          expected: 'object',
          received: 'array',
        },
      ]);
      expect(result.invalidFields).toEqual(['body']);
    });

    it('should check nested values', () => {
      const result = validator.validate(
        { method: 'GET', url: '/users', options: { timeout: '30' } },
        request
      );

      expect(result.errors[0]?.message).toBe(
        "Expected number for 'options.timeout', but received string"
      );
    });

    it('should check enum membership', () => {
      const result = validator.validate({ method: 'TRACE', url: '/users' }, request);

      expect(result.errors).toEqual([
        {
          path: 'method',
          kind: 'TypeMismatch',
          message: "Value for 'method' must be one of: GET, POST",
          expected: ['GET', 'POST'],
          received: 'TRACE',
        },
      ]);
    });

    it('should accept arrays for array fields', () => {
      const result = validator.validate(
        { method: 'GET', url: '/users', headers: ['accept'] },
        request
      );

      expect(result.valid).toBe(true);
    });

    it('should accept expressions for any kind when a prefix is configured', () => {
      const expressions = new Validator({ expressionPrefix: '=' });
      const config = { method: '={{ $json.method }}', url: '/users', options: { timeout: '={{ 30 }}' } };

      expect(expressions.validate(config, request).valid).toBe(true);
      expect(validator.validate(config, request).invalidFields).toEqual(['method', 'options.timeout']);
    });
  });

  describe('hidden values', () => {
    const stale = { method: 'GET', url: '/users', sendBody: true, body: { name: 'x' } };

    it('should report values set on hidden fields without failing validation', () => {
      const result = validator.validate(stale, request);

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([
        {
          path: 'body',
          kind: 'SetWhileHidden',
          message: "Field 'body' is set but not visible for the current configuration",
          received: { name: 'x' },
        },
      ]);
      expect(result.hiddenFields).toEqual(['body']);
    });

    it('should stay quiet when hidden-value reporting is off', () => {
      const quiet = new Validator({ reportHiddenValues: false });

      expect(quiet.validate(stale, request).errors).toEqual([]);
    });

    it('should still check the kind of hidden values', () => {
      const result = validator.validate({ ...stale, body: 'raw' }, request);

      expect(result.errors.map((error) => error.kind)).toEqual(['SetWhileHidden', 'TypeMismatch']);
      expect(result.valid).toBe(false);
    });
  });

  describe('normalization', () => {
    const compare: UnitSchema = {
      unitType: 'compare',
      fields: [
        { path: 'mode', kind: 'enum', requiredWhenVisible: false, options: ['rules', 'expression'] },
        { path: 'operation', kind: 'string', requiredWhenVisible: true, familyTag: 'comparison-operator' },
        { path: 'value2', kind: 'string', requiredWhenVisible: true, familyTag: 'comparison-operator' },
        {
          path: 'singleValue',
          kind: 'boolean',
          requiredWhenVisible: false,
          familyTag: 'comparison-operator',
          visibilityRule: { show: { mode: ['expression'] } },
        },
      ],
      families: [
        {
          tag: 'comparison-operator',
          operatorPath: 'operation',
          secondOperandPath: 'value2',
          singleValueFlagPath: 'singleValue',
        },
      ],
    };

    it('should not require an operand that the operator does not take', () => {
      expect(validator.validate({ operation: 'isEmpty' }, compare).errors).toEqual([]);
    });

    it('should not report a flag the normalizer maintains as hidden', () => {
      const result = validator.validate({ mode: 'rules', operation: 'exists', singleValue: true }, compare);

      expect(result.hiddenFields).toEqual([]);
      expect(result.valid).toBe(true);
    });

    it('should validate the effective configuration', () => {
      const result = validator.validate({ operation: 'equals', singleValue: true }, compare);

      expect(result.errors).toEqual([
        { path: 'value2', kind: 'MissingRequired', message: "Field 'value2' is required", expected: 'string' },
      ]);
    });
  });

  describe('schema defects', () => {
    it('should surface rules that reference unknown paths', () => {
      const broken: UnitSchema = {
        unitType: 'broken',
        fields: [
          { path: 'sendBody', kind: 'boolean', requiredWhenVisible: false },
          {
            path: 'body',
            kind: 'object',
            requiredWhenVisible: false,
            visibilityRule: { show: { sendBdy: [true] } },
          },
        ],
      };

      const result = validator.validate({ sendBody: true }, broken);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          path: 'body',
          kind: 'UnknownPath',
          message: "The show rule of 'body' references unknown path 'sendBdy'",
          expected: 'a declared field path',
          received: 'sendBdy',
        },
      ]);
    });

    it('should place unknown path findings at the owning field', () => {
      const broken: UnitSchema = {
        unitType: 'broken',
        fields: [
          { path: 'url', kind: 'string', requiredWhenVisible: true },
          {
            path: 'body',
            kind: 'object',
            requiredWhenVisible: false,
            visibilityRule: { show: { sendBdy: [true] } },
          },
          { path: 'name', kind: 'string', requiredWhenVisible: true },
        ],
      };

      const result = validator.validate({}, broken);

      expect(result.errors.map(({ path, kind }) => `${kind} ${path}`)).toEqual([
        'MissingRequired url',
        'UnknownPath body',
        'MissingRequired name',
      ]);
      expect(result.missingFields).toEqual(['url', 'name']);
    });
  });

  it('should validate with the default instance', () => {
    expect(validate({ method: 'GET', url: '/users' }, request).valid).toBe(true);
  });

  it('should not modify the configuration it validates', () => {
    const config = { operation: 'isEmpty', value2: 'stale' };
    const compareSchema: UnitSchema = {
      unitType: 'compare',
      fields: [
        { path: 'operation', kind: 'string', requiredWhenVisible: true },
        { path: 'value2', kind: 'string', requiredWhenVisible: true },
      ],
      families: [{ tag: 'comparison-operator', operatorPath: 'operation', secondOperandPath: 'value2' }],
    };

    validator.validate(config, compareSchema);

    expect(config).toEqual({ operation: 'isEmpty', value2: 'stale' });
  });
});

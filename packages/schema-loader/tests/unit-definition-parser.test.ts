import { fileURLToPath } from 'node:url';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { FIELD_KINDS } from '@fieldgate/shared';
import {
  UnitDefinitionParser,
  parseUnitDefinition,
  loadUnitSchemaFromFile,
} from '../src/parsers/unit-definition-parser';
import { defineDiscriminator } from '../src/core/discriminator';
import { ParserError, isParser } from '../src/types/parser';
import type { UnitDefinition } from '../src/schemas/unit-definition';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('UnitDefinitionParser', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('catalog files', () => {
    it('should load a definition from disk', async () => {
      const schema = await loadUnitSchemaFromFile(fixture('http-request.json'));

      expect(schema.unitType).toBe('httpRequest');
      expect(schema.version).toBe(3);
      expect(schema.displayName).toBe('HTTP Request');
      expect(schema.fields.map((field) => field.path)).toEqual([
        'method',
        'url',
        'sendBody',
        'contentType',
        'body',
        'rawBody',
        'options.timeout',
        'options.redirect.follow',
      ]);
    });

    it('should map required and displayOptions onto the field definition', async () => {
      const schema = await loadUnitSchemaFromFile(fixture('http-request.json'));
      const [method, url, sendBody] = schema.fields;

      expect(method).toEqual({
        path: 'method',
        kind: 'enum',
        requiredWhenVisible: true,
        options: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
        default: 'GET',
      });
      expect(url?.displayName).toBe('URL');
      expect(sendBody?.requiredWhenVisible).toBe(false);
      expect(sendBody?.visibilityRule).toBeUndefined();
    });

    it('should compile discriminator activations into show entries', async () => {
      const schema = await loadUnitSchemaFromFile(fixture('http-request.json'));
      const body = schema.fields.find((field) => field.path === 'body');
      const rawBody = schema.fields.find((field) => field.path === 'rawBody');

      expect(body?.visibilityRule).toEqual({
        show: { sendBody: [true], method: ['POST', 'PUT', 'PATCH'] },
      });
      expect(rawBody?.visibilityRule).toEqual({
        show: { sendBody: [true], contentType: ['raw'] },
      });
    });

    it('should publish a frozen schema', async () => {
      const schema = await loadUnitSchemaFromFile(fixture('http-request.json'));

      expect(Object.isFrozen(schema)).toBe(true);
      expect(Object.isFrozen(schema.fields)).toBe(true);
      expect(Object.isFrozen(schema.fields[4]?.visibilityRule?.show)).toBe(true);
    });

    it('should reject files that are not JSON', async () => {
      await expect(loadUnitSchemaFromFile(fixture('truncated.json'))).rejects.toThrow(ParserError);
      await expect(loadUnitSchemaFromFile(fixture('truncated.json'))).rejects.toThrow(
        /not valid JSON/
      );
    });
  });

  describe('inline definitions', () => {
    it('should default required to false and families to none', () => {
      const schema = parseUnitDefinition({
        unitType: 'noop',
        fields: [{ path: 'note', kind: 'string' }],
      });

      expect(schema.fields).toEqual([{ path: 'note', kind: 'string', requiredWhenVisible: false }]);
      expect(schema.families).toEqual([]);
    });

    it('should keep hide rules and family tags', () => {
      const schema = parseUnitDefinition({
        unitType: 'filter',
        fields: [
          { path: 'operation', kind: 'enum', options: ['equals', 'isEmpty'], familyTag: 'comparison-operator' },
          {
            path: 'value2',
            kind: 'string',
            familyTag: 'comparison-operator',
            displayOptions: { hide: { operation: ['isEmpty'] } },
          },
        ],
        families: [{ tag: 'comparison-operator', operatorPath: 'operation', secondOperandPath: 'value2' }],
      });

      expect(schema.fields[1]?.visibilityRule).toEqual({ hide: { operation: ['isEmpty'] } });
      expect(schema.families).toEqual([
        { tag: 'comparison-operator', operatorPath: 'operation', secondOperandPath: 'value2' },
      ]);
    });

    it('should accept every field kind', () => {
      const schema = parseUnitDefinition({
        unitType: 'kinds',
        fields: FIELD_KINDS.map((kind) => ({ path: `${kind}Value`, kind })),
      });

      expect(schema.fields.map((field) => field.kind)).toEqual([...FIELD_KINDS]);
    });

    it('should reject family tags without a normalization strategy', () => {
      const definition: UnitDefinition = JSON.parse(
        '{"unitType":"paged","fields":[{"path":"cursor","kind":"string","familyTag":"pagination"}]}'
      );

      expect(() => parseUnitDefinition(definition)).toThrow(/^Unit definition is malformed: fields\.0\.familyTag: /);
    });

    it('should freeze a copy of the default value', () => {
      const headers = { accept: 'application/json' };

      const schema = parseUnitDefinition({
        unitType: 'request',
        fields: [{ path: 'headers', kind: 'object', default: headers }],
      });

      expect(Object.isFrozen(headers)).toBe(false);
      expect(schema.fields[0]?.default).toEqual({ accept: 'application/json' });
      expect(schema.fields[0]?.default).not.toBe(headers);
      expect(Object.isFrozen(schema.fields[0]?.default)).toBe(true);
    });

    it('should reject rules that read a container path', () => {
      expect(() =>
        parseUnitDefinition({
          unitType: 'nested',
          fields: [
            { path: 'options.mode', kind: 'string' },
            { path: 'flag', kind: 'boolean', displayOptions: { show: { options: ['x'] } } },
          ],
        })
      ).toThrow(`Unit "nested" has 1 schema issue(s): UnknownPath at 'flag'`);
    });

    it('should allow partial discriminators outside strict mode', () => {
      const definition: UnitDefinition = {
        unitType: 'telegram',
        fields: [
          { path: 'resource', kind: 'enum', options: ['message', 'chat'] },
          { path: 'text', kind: 'string', required: true },
        ],
        discriminators: [{ path: 'resource', activates: { message: ['text'] } }],
      };

      const schema = new UnitDefinitionParser({ strict: false }).parse(definition);

      expect(schema.fields[1]?.visibilityRule).toEqual({ show: { resource: ['message'] } });
    });

    it('should match numeric and boolean discriminator options by their string form', () => {
      const schema = parseUnitDefinition({
        unitType: 'versioned',
        fields: [
          { path: 'apiVersion', kind: 'enum', options: [1, 2] },
          { path: 'legacyToken', kind: 'string' },
        ],
        discriminators: [{ path: 'apiVersion', activates: { '1': ['legacyToken'], '2': [] } }],
      });

      expect(schema.fields[1]?.visibilityRule).toEqual({ show: { apiVersion: [1] } });
    });

    it('should warn about circular rules without rejecting them', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const schema = parseUnitDefinition({
        unitType: 'cyclic',
        fields: [
          { path: 'a', kind: 'string', displayOptions: { show: { b: ['on'] } } },
          { path: 'b', kind: 'string', displayOptions: { hide: { a: ['off'] } } },
        ],
      });

      expect(schema.fields).toHaveLength(2);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('"cyclic": a -> b -> a'));
    });

    it('should stay quiet about cycles when warnOnCycles is off', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      parseUnitDefinition(
        {
          unitType: 'cyclic',
          fields: [
            { path: 'a', kind: 'string', displayOptions: { show: { b: ['on'] } } },
            { path: 'b', kind: 'string', displayOptions: { show: { a: ['on'] } } },
          ],
        },
        { warnOnCycles: false }
      );

      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('defineDiscriminator', () => {
    it('should build an activation map from typed values', () => {
      const discriminator = defineDiscriminator('resource', ['message', 'chat'], {
        message: ['text', 'chatId'],
        chat: ['chatId'],
      });

      expect(discriminator).toEqual({
        path: 'resource',
        activates: { message: ['text', 'chatId'], chat: ['chatId'] },
      });
    });
  });

  describe('parser interface', () => {
    it('should satisfy isParser', () => {
      expect(isParser(new UnitDefinitionParser())).toBe(true);
      expect(isParser({ parse: () => null })).toBe(false);
    });

    it('should report parseable definitions through canParse', () => {
      const parser = new UnitDefinitionParser();

      expect(parser.canParse({ unitType: 'x', fields: [{ path: 'a', kind: 'string' }] })).toBe(true);
      expect(parser.canParse({ unitType: 'x', fields: [] })).toBe(false);
      expect(parser.canParse('x')).toBe(false);
    });
  });
});

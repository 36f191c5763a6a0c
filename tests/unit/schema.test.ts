/**
 * Unit tests for the Profile Schema Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  parseSchema,
  loadDefaultSchema,
  declaredPaths,
  describeSchema,
  getSection,
  checkShape,
} from '../../src/schema/index.js';
import { ResearchError } from '../../src/errors/index.js';
import { testSchema } from '../helpers/fakes.js';

function schemaError(definition: unknown): ResearchError {
  try {
    parseSchema(definition);
  } catch (error) {
    if (error instanceof ResearchError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected parseSchema to throw');
}

describe('Profile Schema Module', () => {
  describe('loadDefaultSchema()', () => {
    test('should load the built-in schema once and freeze it', () => {
      const schema = loadDefaultSchema();

      expect(schema.version).toBe('2024-06.1');
      expect(schema.sections).toHaveLength(10);
      expect(schema.sections[0]?.key).toBe('brand');
      expect(Object.isFrozen(schema.sections)).toBe(true);
      expect(loadDefaultSchema()).toBe(schema);
    });

    test('should mark only the advertising section with an advertising signal', () => {
      const withSignal = loadDefaultSchema().sections.filter((section) => section.advertisingSignal !== undefined);

      expect(withSignal.map((section) => section.key)).toEqual(['advertising']);
      expect(withSignal[0]?.advertisingSignal).toEqual({ weight: 0.2, fallbackConfidence: 0.5 });
    });
  });

  describe('parseSchema()', () => {
    test('should apply section defaults', () => {
      const schema = parseSchema({
        version: 'v1',
        sections: [{ key: 'basics', label: 'basics', fields: { name: { type: 'string' } } }],
      });

      expect(schema.sections[0]).toEqual({
        key: 'basics',
        label: 'basics',
        description: '',
        required: true,
        weight: 1,
        queryHints: [],
        fields: { name: { type: 'string' } },
      });
    });

    test('should reject duplicate section keys', () => {
      const error = schemaError({
        version: 'v1',
        sections: [
          { key: 'a', label: 'A', fields: { x: { type: 'string' } } },
          { key: 'a', label: 'A again', fields: { y: { type: 'string' } } },
        ],
      });

      expect(error.code).toBe('CONFIG_INVALID');
      expect(error.message).toContain('duplicate section key: a');
    });

    test('should reject sections without fields', () => {
      const error = schemaError({ version: 'v1', sections: [{ key: 'a', label: 'A', fields: {} }] });

      expect(error.message).toContain('a section declares at least one field');
    });

    test('should reject malformed section keys', () => {
      const error = schemaError({ version: 'v1', sections: [{ key: 'Brand Info', label: 'A', fields: { x: { type: 'string' } } }] });

      expect(error.message).toContain('section keys are lower snake case');
    });
  });

  describe('declaredPaths() / describeSchema() / getSection()', () => {
    test('should list paths in declaration order', () => {
      expect(declaredPaths(testSchema())).toEqual([
        'overview.summary',
        'overview.industry',
        'advertising.advertising_status',
        'advertising.creative_formats',
      ]);
    });

    test('should describe sections without scoring or planning details', () => {
      const description = describeSchema(testSchema());

      expect(description.version).toBe('test-1');
      expect(description.sections[0]).toEqual({
        key: 'overview',
        label: 'company overview',
        description: '',
        required: true,
        fields: { summary: { type: 'string' }, industry: { type: 'string' } },
      });
    });

    test('should find sections by key', () => {
      const schema = testSchema();

      expect(getSection(schema, 'advertising')?.label).toBe('paid advertising');
      expect(getSection(schema, 'missing')).toBeUndefined();
    });
  });

  describe('checkShape()', () => {
    test('should accept matching primitives', () => {
      expect(checkShape({ type: 'string' }, 'Acme')).toEqual({ ok: true, value: 'Acme' });
      expect(checkShape({ type: 'boolean' }, false)).toEqual({ ok: true, value: false });
      expect(checkShape({ type: 'number', integer: true, minimum: 0 }, 12)).toEqual({ ok: true, value: 12 });
    });

    test('should reject numbers outside their bounds', () => {
      expect(checkShape({ type: 'number', minimum: 0 }, -1)).toEqual({
        ok: false,
        message: 'Number must be greater than or equal to 0',
      });
    });

    test('should restrict enums to declared values', () => {
      expect(checkShape({ type: 'enum', values: ['low', 'high'] }, 'high').ok).toBe(true);
      expect(checkShape({ type: 'enum', values: ['low', 'high'] }, 'extreme')).toEqual({
        ok: false,
        message: 'expected one of: low, high',
      });
    });

    test('should report the failing array element', () => {
      expect(checkShape({ type: 'array', items: { type: 'string' } }, ['a', 1])).toEqual({
        ok: false,
        message: 'Expected string, received number at 1',
      });
    });

    test('should enforce maxItems', () => {
      expect(checkShape({ type: 'array', items: { type: 'string' }, maxItems: 1 }, ['a', 'b']).ok).toBe(false);
    });

    test('should strip undeclared keys from nested objects', () => {
      const shape = { type: 'object' as const, properties: { platform: { type: 'string' as const } } };

      expect(checkShape(shape, { platform: 'linkedin', followers: 10 })).toEqual({
        ok: true,
        value: { platform: 'linkedin' },
      });
    });
  });
});

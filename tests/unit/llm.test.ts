/**
 * Unit tests for the LLM Module helpers
 */

import { describe, test, expect } from '@jest/globals';
import { ClaudeClient, loadPromptTemplate, parseJsonObject, renderTemplate, stripCodeFences } from '../../src/llm/index.js';
import { testConfig } from '../helpers/fakes.js';

describe('LLM Module', () => {
  describe('stripCodeFences()', () => {
    test('should remove json and bare fences', () => {
      expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
      expect(stripCodeFences('```\n{"a":1}\n```')).toBe('{"a":1}');
      expect(stripCodeFences('  {"a":1}  ')).toBe('{"a":1}');
    });
  });

  describe('parseJsonObject()', () => {
    test('should take the object out of surrounding prose', () => {
      expect(parseJsonObject('Here you go: {"overview": {"summary": "x"}} Thanks!')).toEqual({ overview: { summary: 'x' } });
    });

    test('should reject arrays and broken JSON with the given code', () => {
      expect(() => parseJsonObject('[1, 2]')).toThrow('Response contains no JSON object');
      expect(() => parseJsonObject('{"a": }', 'DRAFT_PARSE_ERROR')).toThrow('Failed to parse response as JSON');
    });
  });

  describe('renderTemplate()', () => {
    test('should replace every occurrence of known placeholders', () => {
      expect(renderTemplate('{{a}} and {{a}} but {{b}}', { a: 'x' })).toBe('x and x but {{b}}');
    });
  });

  describe('loadPromptTemplate()', () => {
    test('should load bundled templates', async () => {
      const template = await loadPromptTemplate('outreach-email.md');

      expect(template).toContain('{{company_name}}');
    });

    test('should raise CONFIG_INVALID for a missing template', async () => {
      await expect(loadPromptTemplate('missing.md')).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
    });
  });

  describe('ClaudeClient', () => {
    test('should require an API key without injected messages', () => {
      expect(() => new ClaudeClient(testConfig().llm)).toThrow('ANTHROPIC_API_KEY is required');
    });
  });
});

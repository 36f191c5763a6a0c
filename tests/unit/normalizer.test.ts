/**
 * Unit tests for the Normalizer Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  normalizeTarget,
  normalizeQueryText,
  deriveTargetKey,
  extractDomain,
  normalizeUrl,
  trimString,
  displayNameFromDomain,
} from '../../src/normalizer/index.js';

describe('Normalizer Module', () => {
  describe('normalizeTarget()', () => {
    test('should canonicalize a bare URL into a target', () => {
      const result = normalizeTarget({ url: '  www.Acme-Tools.de/ ' });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        key: 'acme-tools.de',
        url: 'https://www.acme-tools.de/',
        domain: 'acme-tools.de',
        displayName: 'Acme Tools',
        notes: null,
      });
      expect(result.metadata.module).toBe('normalizer');
    });

    test('should prefer the provided name for display', () => {
      const result = normalizeTarget({ url: 'https://example.org/about/#team', name: ' Example Org ', notes: ' met at expo ' });

      expect(result.data?.url).toBe('https://example.org/about');
      expect(result.data?.key).toBe('example.org');
      expect(result.data?.displayName).toBe('Example Org');
      expect(result.data?.notes).toBe('met at expo');
    });

    test('should key name-only targets by the normalized name', () => {
      const result = normalizeTarget({ name: '  Acme GmbH & Co. ' });

      expect(result.success).toBe(true);
      expect(result.data?.key).toBe('acme_gmbh_co.');
      expect(result.data?.url).toBeNull();
      expect(result.data?.domain).toBeNull();
      expect(result.data?.displayName).toBe('Acme GmbH & Co.');
    });

    test('should return a frozen target', () => {
      const result = normalizeTarget({ url: 'acme.com' });

      expect(Object.isFrozen(result.data)).toBe(true);
    });

    test('should reject input with neither url nor name', () => {
      const result = normalizeTarget({ url: '   ', name: null });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('TARGET_REQUIRED');
    });

    test('should reject a URL without a usable domain', () => {
      const result = normalizeTarget({ url: 'localhost' });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('INVALID_URL');
      expect(result.error?.details).toEqual({ url: 'localhost' });
    });

    test('should reject non-object and mistyped input', () => {
      expect(normalizeTarget(null).error?.code).toBe('VALIDATION_ERROR');

      const result = normalizeTarget({ url: 42 });
      expect(result.error?.code).toBe('VALIDATION_ERROR');
      expect(result.error?.details).toEqual(['url: Expected string, received number']);
    });

    test('should produce the same key for equivalent inputs', () => {
      const a = normalizeTarget({ url: 'https://www.acme.com' });
      const b = normalizeTarget({ url: 'ACME.com/', name: 'Acme' });

      expect(a.data?.key).toBe('acme.com');
      expect(b.data?.key).toBe('acme.com');
    });
  });

  describe('normalizeQueryText()', () => {
    test('should lower-case, strip punctuation and collapse whitespace', () => {
      expect(normalizeQueryText('  Acme, Inc.  "Pricing"!! ')).toBe('acme inc. pricing');
    });

    test('should apply NFKC folding', () => {
      expect(normalizeQueryText('ＡＣＭＥ  team')).toBe('acme team');
    });

    test('should keep hyphens and dots', () => {
      expect(normalizeQueryText('acme-tools.de Leadership')).toBe('acme-tools.de leadership');
    });
  });

  describe('deriveTargetKey()', () => {
    test('should prefer the domain', () => {
      expect(deriveTargetKey('acme.com', 'Acme')).toBe('acme.com');
    });

    test('should fall back to the name', () => {
      expect(deriveTargetKey(null, 'Blue Ocean Labs')).toBe('blue_ocean_labs');
    });

    test('should return null when the name normalizes to nothing', () => {
      expect(deriveTargetKey(null, '!!!')).toBeNull();
      expect(deriveTargetKey(null, null)).toBeNull();
    });
  });

  describe('helpers', () => {
    test('normalizeUrl() adds a scheme and drops trailing slashes', () => {
      expect(normalizeUrl('example.com/team/')).toBe('https://example.com/team');
      expect(normalizeUrl('http://example.com')).toBe('http://example.com/');
      expect(normalizeUrl('')).toBeNull();
    });

    test('extractDomain() strips www and requires a dot', () => {
      expect(extractDomain('https://WWW.Example.co.uk/path')).toBe('example.co.uk');
      expect(extractDomain('intranet')).toBeNull();
    });

    test('trimString() maps blank strings to null', () => {
      expect(trimString('  a  ')).toBe('a');
      expect(trimString('   ')).toBeNull();
      expect(trimString(undefined)).toBeNull();
    });

    test('displayNameFromDomain() title-cases the first label', () => {
      expect(displayNameFromDomain('blue_ocean-labs.io')).toBe('Blue Ocean Labs');
    });
  });
});

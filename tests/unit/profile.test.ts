/**
 * Unit tests for the Profile Module (placeholders, coverage, merge)
 */

import { describe, test, expect } from '@jest/globals';
import {
  deepFreeze,
  isPopulatedValue,
  sectionCoverage,
  profileCoverage,
  isProfileEmpty,
  mergeFragment,
  mergeFragments,
  combineFragments,
} from '../../src/profile/index.js';
import type { Profile } from '../../src/types/index.js';
import { testSchema } from '../helpers/fakes.js';

describe('Profile Module', () => {
  describe('isPopulatedValue()', () => {
    test('should treat placeholders as empty', () => {
      expect(isPopulatedValue(null)).toBe(false);
      expect(isPopulatedValue(undefined)).toBe(false);
      expect(isPopulatedValue('   ')).toBe(false);
      expect(isPopulatedValue(' N/A ')).toBe(false);
      expect(isPopulatedValue('Not found.')).toBe(false);
      expect(isPopulatedValue('unknown')).toBe(false);
    });

    test('should treat real content as populated', () => {
      expect(isPopulatedValue('Acme builds tools')).toBe(true);
      expect(isPopulatedValue(0)).toBe(true);
      expect(isPopulatedValue(false)).toBe(true);
    });

    test('should look inside containers', () => {
      expect(isPopulatedValue([])).toBe(false);
      expect(isPopulatedValue(['', null])).toBe(false);
      expect(isPopulatedValue(['video'])).toBe(true);
      expect(isPopulatedValue({ platform: '' })).toBe(false);
      expect(isPopulatedValue({ nested: { platform: 'linkedin' } })).toBe(true);
    });
  });

  describe('coverage', () => {
    test('should count populated fields per section', () => {
      const schema = testSchema();
      const profile: Profile = { overview: { summary: 'Tools maker', industry: 'n/a' } };
      const overview = schema.sections[0];
      if (!overview) {
        throw new Error('schema has no sections');
      }

      expect(sectionCoverage(profile, overview)).toEqual({
        section: 'overview',
        populated: 1,
        total: 2,
        coverage: 0.5,
        missingFields: ['industry'],
      });
    });

    test('should report every section of the schema', () => {
      const coverage = profileCoverage({}, testSchema());

      expect(coverage.map((entry) => [entry.section, entry.coverage])).toEqual([
        ['overview', 0],
        ['advertising', 0],
      ]);
    });

    test('isProfileEmpty() should ignore placeholder values', () => {
      expect(isProfileEmpty({})).toBe(true);
      expect(isProfileEmpty({ overview: { summary: 'none' } })).toBe(true);
      expect(isProfileEmpty({ overview: { summary: 'Tools maker' } })).toBe(false);
    });
  });

  describe('mergeFragment()', () => {
    const base: Profile = deepFreeze({ overview: { summary: 'Tools maker' } });

    test('should fill missing fields and keep populated ones', () => {
      const merged = mergeFragment(base, {
        values: { overview: { summary: 'Something else', industry: 'Manufacturing' } },
        corrections: [],
      });

      expect(merged).toEqual({ overview: { summary: 'Tools maker', industry: 'Manufacturing' } });
    });

    test('should overwrite populated fields only when corrected', () => {
      const merged = mergeFragment(base, {
        values: { overview: { summary: 'Hardware retailer' } },
        corrections: ['overview.summary'],
      });

      expect(merged).toEqual({ overview: { summary: 'Hardware retailer' } });
    });

    test('should never store placeholder values', () => {
      const merged = mergeFragment(base, {
        values: { overview: { industry: 'Not specified' }, advertising: { creative_formats: [] } },
        corrections: ['overview.industry'],
      });

      expect(merged).toEqual({ overview: { summary: 'Tools maker' } });
    });

    test('should leave the input untouched and return a frozen profile', () => {
      const merged = mergeFragment(base, { values: { advertising: { creative_formats: ['video'] } }, corrections: [] });

      expect(base).toEqual({ overview: { summary: 'Tools maker' } });
      expect(Object.isFrozen(merged)).toBe(true);
      expect(Object.isFrozen(merged.advertising)).toBe(true);
    });

    test('should not freeze values the caller still holds', () => {
      const formats = ['video', 'image'];
      const fragment = { values: { advertising: { creative_formats: formats } }, corrections: [] };

      const merged = mergeFragment(base, fragment);
      formats.push('carousel');

      expect(Object.isFrozen(formats)).toBe(false);
      expect(Object.isFrozen(fragment.values.advertising)).toBe(false);
      expect(merged.advertising).toEqual({ creative_formats: ['video', 'image'] });
      expect(Object.isFrozen(merged.advertising?.creative_formats)).toBe(true);
    });

    test('should be idempotent', () => {
      const fragment = {
        values: { overview: { summary: 'Hardware retailer', industry: 'Retail' } },
        corrections: ['overview.summary'],
      };

      const once = mergeFragment(base, fragment);
      expect(mergeFragment(once, fragment)).toEqual(once);
    });
  });

  describe('mergeFragments() / combineFragments()', () => {
    const start: Profile = { overview: { summary: 'old summary' } };
    const first = {
      values: { overview: { summary: 'first summary', industry: 'Tools' } },
      corrections: ['overview.summary'],
    };

    test('should merge in order', () => {
      const second = { values: { overview: { summary: 'second summary' } }, corrections: [] };

      expect(mergeFragments(start, [first, second])).toEqual({
        overview: { summary: 'first summary', industry: 'Tools' },
      });
    });

    test('combining then merging equals merging in sequence', () => {
      const second = {
        values: { overview: { summary: 'second summary', industry: 'Retail' }, advertising: { creative_formats: ['image'] } },
        corrections: ['overview.industry'],
      };

      const sequential = mergeFragment(mergeFragment(start, first), second);
      const combined = combineFragments(first, second);

      expect(mergeFragment(start, combined)).toEqual(sequential);
      expect(sequential).toEqual({
        overview: { summary: 'first summary', industry: 'Retail' },
        advertising: { creative_formats: ['image'] },
      });
      expect(combined.corrections).toEqual(['overview.summary', 'overview.industry']);
    });

    test('combining leaves the input values unfrozen', () => {
      const second = { values: { advertising: { creative_formats: ['image'] } }, corrections: [] };

      const combined = combineFragments(first, second);

      expect(Object.isFrozen(second.values.advertising.creative_formats)).toBe(false);
      expect(Object.isFrozen(combined.values.advertising?.creative_formats)).toBe(true);
    });

    test('combining is associative', () => {
      const second = { values: { overview: { industry: 'Retail' } }, corrections: ['overview.industry'] };
      const third = { values: { overview: { summary: 'third summary' } }, corrections: [] };

      const left = combineFragments(combineFragments(first, second), third);
      const right = combineFragments(first, combineFragments(second, third));

      expect(mergeFragment(start, left)).toEqual(mergeFragment(start, right));
    });
  });
});

/**
 * Unit tests for Ad Library search terms and ad relevance
 */

import { describe, test, expect } from '@jest/globals';
import { searchTermVariants, isRelevantAd, type GraphAd } from '../../../src/enrichment/index.js';
import { testTarget } from '../../helpers/fakes.js';

describe('Enrichment Module', () => {
  describe('searchTermVariants()', () => {
    test('should derive distinct variants from the domain and name', () => {
      expect(searchTermVariants(testTarget())).toEqual(['acme-tools', 'acme tools', 'acmetools']);
      expect(searchTermVariants(testTarget({ name: 'Blue Ocean Labs' }))).toEqual(['blue_ocean_labs', 'Blue Ocean Labs']);
    });

    test('should skip domains too short to search', () => {
      expect(searchTermVariants(testTarget({ url: 'ab.io' }))).toEqual([]);
    });
  });

  describe('isRelevantAd()', () => {
    const ad = (pageName?: string): GraphAd => ({ id: '1', page_name: pageName });

    test('should match ads by page name', () => {
      const target = testTarget();

      expect(isRelevantAd(ad('Acme Tools GmbH'), target)).toBe(true);
      expect(isRelevantAd(ad('Acme Industrial Tools'), target)).toBe(true);
    });

    test('should reject other pages and ads without one', () => {
      const target = testTarget();

      expect(isRelevantAd(ad('Acme Bakery'), target)).toBe(false);
      expect(isRelevantAd(ad(undefined), target)).toBe(false);
    });
  });
});

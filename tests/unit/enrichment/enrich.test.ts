/**
 * Unit tests for advertising enrichment and its profile fragment
 */

import { describe, test, expect } from '@jest/globals';
import {
  createFallbackResult,
  enrichAdvertising,
  adFragmentFromIntelligence,
  NullAdDataSource,
  getAdDataSource,
  type EnrichmentSettings,
  type RawAdData,
} from '../../../src/enrichment/index.js';
import { ResearchError } from '../../../src/errors/index.js';
import { silentLogger } from '../../../src/observability/index.js';
import { loadDefaultSchema } from '../../../src/schema/index.js';
import type { AdIntelligenceResult } from '../../../src/types/index.js';
import { FIXED_NOW, FakeAdSource, instantPolicies, rawAds, testConfig, testSchema, testTarget } from '../../helpers/fakes.js';

const settings: EnrichmentSettings = {
  enabled: true,
  credential: 'test-token',
  sophistication: { minFormatsForDiversity: 2, minAbTestGroups: 1, highVolumeThreshold: 10 },
};

function deps(source: FakeAdSource | NullAdDataSource | null, signal?: AbortSignal) {
  return { source, policy: instantPolicies().advertising, signal, logger: silentLogger, now: () => FIXED_NOW };
}

describe('Enrichment Module', () => {
  describe('enrichAdvertising()', () => {
    test('should return a live result from the data source', async () => {
      const source = new FakeAdSource(rawAds());

      const result = await enrichAdvertising(testTarget(), settings, deps(source));

      expect(result.mode).toBe('live');
      expect(result.fallbackReason).toBeNull();
      expect(result.counts).toEqual({ activeAds: 3, totalAds: 4, platformDistribution: { facebook: 4, instagram: 2 } });
      expect(result.signals.themes).toEqual(['sale', 'free shipping']);
      expect(result.summary.sophistication).toBe('medium');
      expect(result.producedAt).toBe('2024-06-03T09:41:00.000Z');
      expect(source.calls).toBe(1);
    });

    test('should fall back without calling the source when disabled', async () => {
      const source = new FakeAdSource(rawAds());

      const result = await enrichAdvertising(testTarget(), { ...settings, enabled: false }, deps(source));

      expect(result.mode).toBe('fallback');
      expect(result.fallbackReason).toBe('disabled');
      expect(source.calls).toBe(0);
    });

    test('should fall back when no credential or source is available', async () => {
      const source = new FakeAdSource(rawAds());

      const noCredential = await enrichAdvertising(testTarget(), { ...settings, credential: undefined }, deps(source));
      const noSource = await enrichAdvertising(testTarget(), settings, deps(null));

      expect(noCredential.fallbackReason).toBe('no_credential');
      expect(noSource.fallbackReason).toBe('no_credential');
      expect(source.calls).toBe(0);
    });

    test('should not retry a rejected credential', async () => {
      const source = new FakeAdSource(new ResearchError('CREDENTIAL_INVALID', 'token expired'));

      const result = await enrichAdvertising(testTarget(), settings, deps(source));

      expect(result.fallbackReason).toBe('CREDENTIAL_INVALID');
      expect(source.calls).toBe(1);
    });

    test('should retry an unavailable source, then fall back', async () => {
      const source = new FakeAdSource(new ResearchError('UNAVAILABLE', 'HTTP 503'));

      const result = await enrichAdvertising(testTarget(), settings, deps(source));

      expect(result.fallbackReason).toBe('UNAVAILABLE');
      expect(result.summary.activeCampaignsSummary).toBe('Advertising data unavailable (UNAVAILABLE)');
      expect(source.calls).toBe(2);
    });

    test('should map an unconfigured provider to ENRICHMENT_UNAVAILABLE', async () => {
      const result = await enrichAdvertising(testTarget(), settings, deps(new NullAdDataSource()));

      expect(result.fallbackReason).toBe('ENRICHMENT_UNAVAILABLE');
    });

    test('should report cancellation as a timeout', async () => {
      const controller = new AbortController();
      controller.abort();
      const source = new FakeAdSource(rawAds());

      const result = await enrichAdvertising(testTarget(), settings, deps(source, controller.signal));

      expect(result.fallbackReason).toBe('TIMEOUT');
      expect(source.calls).toBe(0);
    });
  });

  describe('adFragmentFromIntelligence()', () => {
    function live(overrides: Partial<RawAdData> = {}): Promise<AdIntelligenceResult> {
      return enrichAdvertising(testTarget(), settings, deps(new FakeAdSource(rawAds(overrides))));
    }

    test('should fill only declared fields of advertising sections', async () => {
      const fragment = adFragmentFromIntelligence(await live(), testSchema());

      expect(fragment).toEqual({
        values: { advertising: { advertising_status: 'active_advertiser', creative_formats: ['carousel', 'image'] } },
        corrections: [],
      });
    });

    test('should fill themes and intensity where the schema declares them', async () => {
      const fragment = adFragmentFromIntelligence(await live(), loadDefaultSchema());

      expect(fragment?.values.advertising).toEqual({
        advertising_status: 'active_advertiser',
        creative_formats: ['carousel', 'image'],
        messaging_themes: ['sale', 'free shipping'],
        advertising_intensity: 'medium',
      });
    });

    test('should skip empty signals', async () => {
      const result = await live({ activeAds: 0, totalAds: 0, platformDistribution: {}, creativeFormats: {}, abTestGroups: 0, themes: [] });

      expect(adFragmentFromIntelligence(result, loadDefaultSchema())?.values).toEqual({
        advertising: { advertising_status: 'no_ads_found' },
      });
    });

    test('should return null for fallback results', () => {
      expect(adFragmentFromIntelligence(createFallbackResult('TIMEOUT', FIXED_NOW), testSchema())).toBeNull();
    });
  });

  describe('getAdDataSource()', () => {
    test('should pick the source by access token', () => {
      expect(getAdDataSource(testConfig(), silentLogger).name).toBe('null');
      expect(getAdDataSource(testConfig({ meta: { accessToken: 'test-token' } }), silentLogger).name).toBe('meta_ad_library');
    });
  });
});

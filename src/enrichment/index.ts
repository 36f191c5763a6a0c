/**
 * Advertising Intelligence Enrichment Module
 *
 * Gathers and summarizes paid-advertising activity for a research target.
 *
 * Key behaviors:
 * - Enrichment is OPTIONAL and NON-BLOCKING
 * - CHECK_CREDENTIAL -> LIVE_FETCH | FALLBACK -> SUMMARIZE
 * - Disabled enrichment or a missing credential goes straight to FALLBACK
 * - Every live-fetch failure degrades to FALLBACK tagged with its reason
 * - Always returns exactly one AdIntelligenceResult; never throws
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ResearchError, classifyError } from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, noopMetrics } from '../observability/index.js';
import { raceAbort, type ExternalCallPolicy } from '../rate-limiter/index.js';
import { deepFreeze, isPopulatedValue } from '../profile/index.js';
import { checkShape, type ProfileSchema } from '../schema/index.js';
import type { PipelineConfig, SophisticationPolicy } from '../config/index.js';
import type {
  AdIntelligenceResult,
  AdNarrative,
  FallbackReason,
  JsonValue,
  ProfileFragment,
  ResearchTarget,
  SophisticationLevel,
  TargetingBreadth,
} from '../types/index.js';

// =============================================================================
// Types and Interfaces
// =============================================================================

export type EnrichmentState = 'CHECK_CREDENTIAL' | 'LIVE_FETCH' | 'FALLBACK' | 'SUMMARIZE';

/**
 * Raw counts and signals returned by an advertising data source
 */
export interface RawAdData {
  activeAds: number;
  totalAds: number;
  platformDistribution: Record<string, number>;
  creativeFormats: Record<string, number>;
  abTestGroups: number;
  themes: string[];
  latestActivity: string | null;
}

/**
 * Runs one external request through the advertising call policy
 */
export type AdCallRunner = <T>(label: string, call: (signal?: AbortSignal) => Promise<T>) => Promise<T>;

/**
 * Advertising data source capability. Every HTTP request goes through `run`.
 * Fails with a ResearchError coded CREDENTIAL_INVALID, RATE_LIMITED or UNAVAILABLE.
 */
export interface AdDataSource {
  /** Provider name for logging */
  readonly name: string;
  fetchAds(target: ResearchTarget, credential: string, run: AdCallRunner): Promise<RawAdData>;
}

export interface EnrichmentSettings {
  enabled: boolean;
  credential?: string;
  sophistication: SophisticationPolicy;
}

export interface EnrichmentDeps {
  source: AdDataSource | null;
  policy: ExternalCallPolicy;
  signal?: AbortSignal;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

// =============================================================================
// Summarization
// =============================================================================

const NO_ADS_OPPORTUNITIES = [
  'Consider starting Meta advertising campaigns',
  'Establish presence on Facebook and Instagram',
  'Develop advertising creative strategy',
];

function countPositive(tally: Record<string, number>): number {
  return Object.values(tally).filter((count) => count > 0).length;
}

function targetingBreadth(platformCount: number): TargetingBreadth {
  if (platformCount === 0) {
    return 'none';
  }
  if (platformCount === 1) {
    return 'narrow';
  }
  return platformCount >= 4 ? 'broad' : 'moderate';
}

/**
 * Derive the advertising narrative from raw counts. Deterministic: identical
 * input and policy always give identical output.
 *
 * Sophistication is `none` without ads, `low` without both creative-format
 * diversity and A/B evidence, `high` with both and at least
 * `highVolumeThreshold` ads, `medium` otherwise.
 */
export function summarizeAdActivity(raw: RawAdData, policy: SophisticationPolicy): AdNarrative {
  if (raw.totalAds === 0) {
    return {
      advertisingStatus: 'no_ads_found',
      sophistication: 'none',
      targetingBreadth: 'none',
      activeCampaignsSummary: 'No advertising campaigns found on Meta platforms',
      optimizationOpportunities: [...NO_ADS_OPPORTUNITIES],
    };
  }

  const formatDiversity = countPositive(raw.creativeFormats) >= policy.minFormatsForDiversity;
  const abEvidence = raw.abTestGroups >= policy.minAbTestGroups;

  let sophistication: SophisticationLevel;
  if (!formatDiversity && !abEvidence) {
    sophistication = 'low';
  } else if (formatDiversity && abEvidence && raw.totalAds >= policy.highVolumeThreshold) {
    sophistication = 'high';
  } else {
    sophistication = 'medium';
  }

  const platforms = Object.keys(raw.platformDistribution)
    .filter((platform) => (raw.platformDistribution[platform] ?? 0) > 0)
    .sort();
  const breadth = targetingBreadth(platforms.length);

  const opportunities: string[] = [];
  if (raw.activeAds === 0) {
    opportunities.push('Reactivate paused campaigns');
  }
  if (!formatDiversity) {
    opportunities.push('Test additional creative formats such as video or carousel');
  }
  if (!abEvidence) {
    opportunities.push('Introduce A/B testing of ad copy');
  }
  if (breadth === 'narrow' || breadth === 'moderate') {
    opportunities.push('Expand delivery to additional placements');
  }

  const platformText = platforms.length > 0 ? ` across ${platforms.join(', ')}` : '';
  return {
    advertisingStatus: raw.activeAds > 0 ? 'active_advertiser' : 'inactive_advertiser',
    sophistication,
    targetingBreadth: breadth,
    activeCampaignsSummary: `Running ${raw.activeAds} active of ${raw.totalAds} ads${platformText}`,
    optimizationOpportunities: opportunities,
  };
}

function fallbackNarrative(reason: FallbackReason): AdNarrative {
  let summary: string;
  let opportunities: string[];
  switch (reason) {
    case 'disabled':
      summary = 'Advertising analysis disabled';
      opportunities = [];
      break;
    case 'no_credential':
      summary = 'Advertising data source credential not configured';
      opportunities = [];
      break;
    case 'CREDENTIAL_INVALID':
      summary = 'Advertising data source rejected the configured credential';
      opportunities = ['Fix advertising data source configuration to enable analysis'];
      break;
    default:
      summary = `Advertising data unavailable (${reason})`;
      opportunities = ['Retry advertising analysis'];
  }
  return {
    advertisingStatus: 'unavailable',
    sophistication: 'unknown',
    targetingBreadth: 'unknown',
    activeCampaignsSummary: summary,
    optimizationOpportunities: opportunities,
  };
}

const EMPTY_RAW: RawAdData = {
  activeAds: 0,
  totalAds: 0,
  platformDistribution: {},
  creativeFormats: {},
  abTestGroups: 0,
  themes: [],
  latestActivity: null,
};

function buildResult(
  raw: RawAdData,
  narrative: AdNarrative,
  reason: FallbackReason | null,
  producedAt: Date
): AdIntelligenceResult {
  const result: AdIntelligenceResult = {
    mode: reason === null ? 'live' : 'fallback',
    fallbackReason: reason,
    counts: {
      activeAds: raw.activeAds,
      totalAds: raw.totalAds,
      platformDistribution: { ...raw.platformDistribution },
    },
    signals: {
      creativeFormats: { ...raw.creativeFormats },
      abTestGroups: raw.abTestGroups,
      themes: [...raw.themes],
      latestActivity: raw.latestActivity,
    },
    summary: narrative,
    producedAt: producedAt.toISOString(),
  };
  return deepFreeze(result);
}

/**
 * Deterministic, clearly labeled placeholder result
 */
export function createFallbackResult(reason: FallbackReason, producedAt: Date = new Date()): AdIntelligenceResult {
  return buildResult(EMPTY_RAW, fallbackNarrative(reason), reason, producedAt);
}

function fallbackReasonFor(error: ResearchError): FallbackReason {
  switch (error.code) {
    case 'CREDENTIAL_INVALID':
    case 'RATE_LIMITED':
    case 'UNAVAILABLE':
    case 'TIMEOUT':
      return error.code;
    case 'CANCELLED':
      return 'TIMEOUT';
    default:
      return 'ENRICHMENT_UNAVAILABLE';
  }
}

// =============================================================================
// Core Function
// =============================================================================

/**
 * Produce the run's advertising intelligence
 *
 * @returns exactly one result, `live` or `fallback` (never throws)
 */
export async function enrichAdvertising(
  target: ResearchTarget,
  settings: EnrichmentSettings,
  deps: EnrichmentDeps
): Promise<AdIntelligenceResult> {
  const logger = deps.logger ?? createLogger('enrichment');
  const metrics = deps.metrics ?? noopMetrics;
  const now = deps.now ?? (() => new Date());
  const startTime = Date.now();

  const enter = (state: EnrichmentState, context: Record<string, unknown> = {}): void => {
    logger.debug(`Enrichment state ${state}`, { target: target.key, ...context });
  };

  const fallback = (reason: FallbackReason): AdIntelligenceResult => {
    enter('FALLBACK', { reason });
    enter('SUMMARIZE', { mode: 'fallback' });
    metrics.increment('enrichment.fallback', { reason });
    metrics.timing('enrichment.duration', Date.now() - startTime, { mode: 'fallback' });
    return createFallbackResult(reason, now());
  };

  enter('CHECK_CREDENTIAL');
  metrics.increment('enrichment.started');

  if (!settings.enabled) {
    logger.info('Advertising enrichment disabled, using fallback', { target: target.key });
    return fallback('disabled');
  }
  if (!settings.credential || !deps.source) {
    logger.info('No advertising credential available, using fallback', { target: target.key });
    return fallback('no_credential');
  }

  const source = deps.source;
  const credential = settings.credential;
  enter('LIVE_FETCH', { source: source.name });

  const run: AdCallRunner = (label, call) => deps.policy.run(label, call, deps.signal);

  let raw: RawAdData;
  try {
    raw = await raceAbort(source.fetchAds(target, credential, run), deps.signal, 'advertising fetch');
  } catch (error) {
    const classified = classifyError(error, 'advertising fetch');
    const reason = fallbackReasonFor(classified);
    logger.warn('Advertising live fetch failed, using fallback', {
      target: target.key,
      code: classified.code,
      reason,
      error: classified.message,
    });
    return fallback(reason);
  }

  enter('SUMMARIZE', { mode: 'live' });
  const narrative = summarizeAdActivity(raw, settings.sophistication);

  logger.info('Advertising enrichment completed', {
    target: target.key,
    totalAds: raw.totalAds,
    activeAds: raw.activeAds,
    sophistication: narrative.sophistication,
  });
  metrics.increment('enrichment.live', { sophistication: narrative.sophistication });
  metrics.timing('enrichment.duration', Date.now() - startTime, { mode: 'live' });

  return buildResult(raw, narrative, null, now());
}

/**
 * Profile values implied by a live result, limited to fields the schema
 * declares on sections that carry an advertising signal. Null for fallback.
 */
export function adFragmentFromIntelligence(
  result: AdIntelligenceResult,
  schema: ProfileSchema
): Pick<ProfileFragment, 'values' | 'corrections'> | null {
  if (result.mode !== 'live') {
    return null;
  }

  const intensity: Partial<Record<SophisticationLevel, string>> = {
    low: 'low',
    medium: 'medium',
    high: 'high',
  };
  const candidates: Record<string, JsonValue | undefined> = {
    advertising_status: result.summary.advertisingStatus,
    creative_formats: Object.keys(result.signals.creativeFormats).sort(),
    messaging_themes: [...result.signals.themes],
    advertising_intensity: intensity[result.summary.sophistication],
  };

  const values: Record<string, Record<string, JsonValue>> = {};
  for (const section of schema.sections) {
    if (!section.advertisingSignal) {
      continue;
    }
    for (const [field, shape] of Object.entries(section.fields)) {
      const candidate = candidates[field];
      if (candidate === undefined || !isPopulatedValue(candidate)) {
        continue;
      }
      const check = checkShape(shape, candidate);
      if (check.ok) {
        values[section.key] = { ...(values[section.key] ?? {}), [field]: check.value };
      }
    }
  }

  return Object.keys(values).length > 0 ? deepFreeze({ values, corrections: [] }) : null;
}

// =============================================================================
// Ad Data Sources
// =============================================================================

/**
 * Null source - used when no advertising provider is configured
 */
export class NullAdDataSource implements AdDataSource {
  readonly name = 'null';

  async fetchAds(): Promise<RawAdData> {
    throw new ResearchError('ENRICHMENT_UNAVAILABLE', 'No advertising data source configured');
  }
}

const META_AD_FIELDS = [
  'id',
  'page_id',
  'page_name',
  'ad_delivery_start_time',
  'ad_delivery_stop_time',
  'publisher_platforms',
  'impressions',
  'ad_creative_bodies',
  'ad_creative_link_titles',
].join(',');

/** Marketing vocabulary scanned for in ad copy */
const THEME_WORDS = [
  'free', 'kostenlos', 'new', 'neu', 'now', 'jetzt', 'limited', 'offer', 'save',
  'exclusive', 'premium', 'professional', 'expert', 'trusted', 'proven',
  'guaranteed', 'discover', 'transform', 'boost', 'improve',
];

const MAX_THEMES = 5;
const MAX_SEARCH_TERMS = 4;

const GraphAdSchema = z.object({
  id: z.string(),
  page_id: z.string().optional(),
  page_name: z.string().optional(),
  ad_delivery_start_time: z.string().optional(),
  ad_delivery_stop_time: z.string().nullable().optional(),
  publisher_platforms: z.array(z.string()).optional(),
  ad_creative_bodies: z.array(z.string()).optional(),
  ad_creative_link_titles: z.array(z.string()).optional(),
});

const GraphAdsResponseSchema = z.object({
  data: z.array(GraphAdSchema).default([]),
});

export type GraphAd = z.infer<typeof GraphAdSchema>;

export interface MetaSourceSettings {
  apiVersion: string;
  countries: string[];
  adLimit: number;
  timeoutMs: number;
}

function titleCase(text: string): string {
  return text
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Search-term variants for the Ad Library, derived from the domain's base
 * name and the display name; case-insensitive duplicates and terms of two
 * characters or fewer are skipped.
 */
export function searchTermVariants(target: ResearchTarget): string[] {
  const base = (target.domain?.split('.')[0] ?? target.key).toLowerCase();
  const variants = [
    base,
    base.replace(/-/g, ' '),
    base.replace(/-/g, ''),
    titleCase(base.replace(/-/g, ' ')),
    target.displayName,
  ];

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const variant of variants) {
    const key = variant.trim().toLowerCase();
    if (key.length <= 2 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(variant.trim());
  }
  return unique.slice(0, MAX_SEARCH_TERMS);
}

/**
 * An ad is relevant when its page name contains the base name or one of the
 * search-term variants
 */
export function isRelevantAd(ad: GraphAd, target: ResearchTarget): boolean {
  const pageName = (ad.page_name ?? '').toLowerCase();
  if (pageName.length === 0) {
    return false;
  }
  const names = searchTermVariants(target).map((term) => term.toLowerCase());
  if (names.some((name) => pageName.includes(name))) {
    return true;
  }
  const baseWords = (target.domain?.split('.')[0] ?? target.key).toLowerCase().split(/[-_]/);
  return baseWords.length > 1 && baseWords.every((word) => word.length > 0 && pageName.includes(word));
}

function creativeFormat(ad: GraphAd): string {
  const cards = ad.ad_creative_link_titles?.length ?? 0;
  if (cards > 1) {
    return 'carousel';
  }
  if (cards === 1) {
    return 'link';
  }
  return (ad.ad_creative_bodies?.length ?? 0) > 0 ? 'text' : 'other';
}

function deliveryWindow(ad: GraphAd, now: Date): [number, number] | null {
  const start = ad.ad_delivery_start_time ? Date.parse(ad.ad_delivery_start_time) : NaN;
  if (Number.isNaN(start)) {
    return null;
  }
  const stop = ad.ad_delivery_stop_time ? Date.parse(ad.ad_delivery_stop_time) : now.getTime();
  return [start, Number.isNaN(stop) ? now.getTime() : stop];
}

/**
 * Count headline groups holding concurrently delivered ads with different copy
 */
function countAbTestGroups(ads: readonly GraphAd[], now: Date): number {
  const byHeadline = new Map<string, GraphAd[]>();
  for (const ad of ads) {
    const headline = ad.ad_creative_link_titles?.[0]?.trim().toLowerCase();
    if (!headline) {
      continue;
    }
    byHeadline.set(headline, [...(byHeadline.get(headline) ?? []), ad]);
  }

  let groups = 0;
  for (const group of byHeadline.values()) {
    const found = group.some((a, i) =>
      group.slice(i + 1).some((b) => {
        const bodyA = (a.ad_creative_bodies ?? []).join('\n');
        const bodyB = (b.ad_creative_bodies ?? []).join('\n');
        const windowA = deliveryWindow(a, now);
        const windowB = deliveryWindow(b, now);
        return bodyA !== bodyB && windowA !== null && windowB !== null && windowA[0] <= windowB[1] && windowB[0] <= windowA[1];
      })
    );
    if (found) {
      groups += 1;
    }
  }
  return groups;
}

/**
 * Tally raw ads into counts and signals
 */
export function tallyAds(ads: readonly GraphAd[], now: Date): RawAdData {
  const platformDistribution: Record<string, number> = {};
  const creativeFormats: Record<string, number> = {};
  let activeAds = 0;
  let latest = Number.NEGATIVE_INFINITY;

  for (const ad of ads) {
    const window = deliveryWindow(ad, now);
    const stop = ad.ad_delivery_stop_time ? Date.parse(ad.ad_delivery_stop_time) : NaN;
    if (!ad.ad_delivery_stop_time || stop > now.getTime()) {
      activeAds += 1;
    }
    if (window) {
      latest = Math.max(latest, window[0], Number.isNaN(stop) ? window[0] : stop);
    }
    for (const platform of ad.publisher_platforms ?? []) {
      const key = platform.toLowerCase();
      platformDistribution[key] = (platformDistribution[key] ?? 0) + 1;
    }
    const format = creativeFormat(ad);
    creativeFormats[format] = (creativeFormats[format] ?? 0) + 1;
  }

  const copy = ads.flatMap((ad) => ad.ad_creative_bodies ?? []).join(' ').toLowerCase();
  const themes = THEME_WORDS.filter((word) => new RegExp(`\\b${word}\\b`, 'u').test(copy)).slice(0, MAX_THEMES);

  return {
    activeAds,
    totalAds: ads.length,
    platformDistribution,
    creativeFormats,
    abTestGroups: countAbTestGroups(ads, now),
    themes,
    latestActivity: Number.isFinite(latest) ? new Date(latest).toISOString() : null,
  };
}

/**
 * Meta Ad Library (Graph API `ads_archive`) source
 */
export class MetaAdLibrarySource implements AdDataSource {
  readonly name = 'meta_ad_library';
  private readonly client: AxiosInstance;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly settings: MetaSourceSettings,
    deps: { client?: AxiosInstance; logger?: Logger; now?: () => Date } = {}
  ) {
    this.client = deps.client ?? axios.create({
      baseURL: 'https://graph.facebook.com',
      timeout: settings.timeoutMs,
    });
    this.logger = deps.logger ?? createLogger('enrichment');
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * One `ads_archive` request per search term, each through `run`. Pages of
   * terms that failed are skipped; the fetch fails only on a rejected
   * credential or when no term succeeded.
   */
  async fetchAds(target: ResearchTarget, credential: string, run: AdCallRunner): Promise<RawAdData> {
    const terms = searchTermVariants(target);
    this.logger.debug('Searching Meta Ad Library', { target: target.key, terms });

    const settled = await Promise.allSettled(
      terms.map((term) => run(`ads_archive:${term}`, (signal) => this.searchAds(term, credential, signal)))
    );

    const pages: GraphAd[][] = [];
    const failures: ResearchError[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        pages.push(outcome.value);
        return;
      }
      const failure = classifyError(outcome.reason, 'ad library search');
      failures.push(failure);
      this.logger.warn('Ad Library search term failed', { target: target.key, term: terms[index], code: failure.code });
    });

    const fatal = failures.find((failure) => failure.code === 'CREDENTIAL_INVALID') ?? (pages.length === 0 ? failures[0] : undefined);
    if (fatal) {
      throw fatal;
    }

    const seen = new Set<string>();
    const relevant: GraphAd[] = [];
    for (const ad of pages.flat()) {
      if (seen.has(ad.id) || !isRelevantAd(ad, target)) {
        continue;
      }
      seen.add(ad.id);
      relevant.push(ad);
    }

    this.logger.info('Meta Ad Library search completed', {
      target: target.key,
      raw: pages.reduce((sum, page) => sum + page.length, 0),
      relevant: relevant.length,
    });

    return tallyAds(relevant, this.now());
  }

  private async searchAds(term: string, credential: string, signal?: AbortSignal): Promise<GraphAd[]> {
    const response = await this.client.get<unknown>(`/${this.settings.apiVersion}/ads_archive`, {
      params: {
        access_token: credential,
        search_terms: term,
        ad_reached_countries: JSON.stringify(this.settings.countries),
        ad_active_status: 'ALL',
        ad_type: 'ALL',
        limit: this.settings.adLimit,
        fields: META_AD_FIELDS,
      },
      signal,
    });

    const parsed = GraphAdsResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ResearchError('UNAVAILABLE', 'Unexpected Ad Library response shape', {
        details: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }
    return parsed.data.data;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build the advertising data source from configuration
 */
export function getAdDataSource(config: Pick<PipelineConfig, 'meta'>, logger: Logger = createLogger('enrichment')): AdDataSource {
  if (!config.meta.accessToken) {
    logger.debug('No Meta access token configured, using NullAdDataSource');
    return new NullAdDataSource();
  }
  return new MetaAdLibrarySource(
    {
      apiVersion: config.meta.apiVersion,
      countries: config.meta.countries,
      adLimit: config.meta.adLimit,
      timeoutMs: config.meta.timeoutMs,
    },
    { logger }
  );
}

export default {
  enrichAdvertising,
  summarizeAdActivity,
  createFallbackResult,
  adFragmentFromIntelligence,
  tallyAds,
  searchTermVariants,
  getAdDataSource,
};

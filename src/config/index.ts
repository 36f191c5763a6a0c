/**
 * Configuration Module
 *
 * Loads the pipeline configuration from environment variables plus
 * programmatic overrides and validates it with zod. The result is frozen.
 *
 * Usage:
 * ```typescript
 * const config = loadConfig(process.env, { maxRounds: 2 });
 * ```
 */

import { z } from 'zod';
import { ResearchError } from '../errors/index.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG = {
  maxRounds: 3,
  maxQueriesPerRound: 4,
  stateTimeoutMs: 120_000,
  rateLimitCalls: 60,
  rateLimitWindowMs: 60_000,
  rateLimitMaxConcurrent: 4,
  retryMaxAttempts: 3,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 8_000,
  firecrawlApiUrl: 'https://api.firecrawl.dev',
  anthropicModel: 'claude-sonnet-4-20250514',
  metaApiVersion: 'v18.0',
  metaCountries: ['DE', 'AT', 'CH'],
  metaAdLimit: 50,
  /** Graph API budget for the Ad Library, calls per hour */
  metaRateLimitCalls: 150,
  idempotencyWindowMinutes: 60,
} as const;

/** States that suspend on external calls and run under a wall-clock timeout */
const TIMED_STATES = ['RETRIEVING', 'EXTRACTING', 'ENRICHING'] as const;
export type TimedState = (typeof TIMED_STATES)[number];

// ============================================================================
// Schema
// ============================================================================

const booleanFlag = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}, z.boolean());

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const RateLimitSchema = z.object({
  calls: positiveInt,
  windowMs: positiveInt,
  maxConcurrent: positiveInt,
});

const PipelineConfigSchema = z.object({
  maxRounds: positiveInt.max(10).default(DEFAULT_CONFIG.maxRounds),
  maxQueriesPerRound: positiveInt.max(20).default(DEFAULT_CONFIG.maxQueriesPerRound),
  enableAdEnrichment: booleanFlag.default(true),
  lowCoverageThreshold: z.coerce.number().min(0).max(1).default(0.5),
  timeouts: z.object({
    defaultMs: positiveInt.default(DEFAULT_CONFIG.stateTimeoutMs),
    perState: z.object({
      RETRIEVING: positiveInt.optional(),
      EXTRACTING: positiveInt.optional(),
      ENRICHING: positiveInt.optional(),
    }).default({}),
  }).default({}),
  rateLimitPerSource: z.object({
    retrieval: RateLimitSchema,
    extraction: RateLimitSchema,
    advertising: RateLimitSchema,
  }),
  retry: z.object({
    maxAttempts: positiveInt.default(DEFAULT_CONFIG.retryMaxAttempts),
    baseDelayMs: nonNegativeInt.default(DEFAULT_CONFIG.retryBaseDelayMs),
    maxDelayMs: nonNegativeInt.default(DEFAULT_CONFIG.retryMaxDelayMs),
  }).default({}),
  extraction: z.object({
    maxRetries: nonNegativeInt.default(1),
    maxItemChars: positiveInt.default(6_000),
  }).default({}),
  retrieval: z.object({
    apiKey: z.string().min(1).optional(),
    apiUrl: z.string().url().default(DEFAULT_CONFIG.firecrawlApiUrl),
    maxResultsPerQuery: positiveInt.default(3),
    timeoutMs: positiveInt.default(30_000),
  }).default({}),
  llm: z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default(DEFAULT_CONFIG.anthropicModel),
    maxTokens: positiveInt.default(4096),
    temperature: z.coerce.number().min(0).max(1).default(0.2),
    timeoutMs: positiveInt.default(120_000),
  }).default({}),
  meta: z.object({
    accessToken: z.string().min(1).optional(),
    apiVersion: z.string().regex(/^v\d+\.\d+$/).default(DEFAULT_CONFIG.metaApiVersion),
    countries: z.array(z.string().length(2)).min(1).default([...DEFAULT_CONFIG.metaCountries]),
    adLimit: positiveInt.max(500).default(DEFAULT_CONFIG.metaAdLimit),
    timeoutMs: positiveInt.default(30_000),
  }).default({}),
  sophistication: z.object({
    minFormatsForDiversity: positiveInt.default(2),
    minAbTestGroups: positiveInt.default(1),
    highVolumeThreshold: positiveInt.default(10),
  }).default({}),
  storage: z.object({
    bucket: z.string().min(1).optional(),
    region: z.string().min(1).default('us-east-1'),
    prefix: z.string().default('runs'),
  }).default({}),
  idempotencyWindowMinutes: positiveInt.default(DEFAULT_CONFIG.idempotencyWindowMinutes),
  sender: z.object({
    name: z.string().default('Your Name'),
    company: z.string().default('Your Company'),
    role: z.string().default('Your Role'),
    offering: z.string().default('Our Services'),
    tone: z.string().default('professional'),
    length: z.enum(['short', 'medium', 'long']).default('medium'),
    callToAction: z.string().default('schedule a call'),
  }).default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RateLimitSettings = z.infer<typeof RateLimitSchema>;
export type RetrySettings = PipelineConfig['retry'];
export type SophisticationPolicy = PipelineConfig['sophistication'];
export type SourceName = keyof PipelineConfig['rateLimitPerSource'];
export type SenderSettings = PipelineConfig['sender'];

/**
 * Programmatic overrides. Nested sections merge over the environment values.
 */
export type ConfigOverrides = {
  [K in keyof PipelineConfig]?: PipelineConfig[K] extends readonly unknown[]
    ? PipelineConfig[K]
    : PipelineConfig[K] extends Record<string, unknown>
      ? { [P in keyof PipelineConfig[K]]?: PipelineConfig[K][P] extends Record<string, unknown> ? Partial<PipelineConfig[K][P]> : PipelineConfig[K][P] }
      : PipelineConfig[K];
};

export type Env = Record<string, string | undefined>;

// ============================================================================
// Loading
// ============================================================================

function envValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `overlay` onto `base`, recursing into plain objects; undefined overlay values are skipped
 */
function mergeDeep(base: Record<string, unknown>, overlay: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) {
      continue;
    }
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeDeep(current, value) : value;
  }
  return merged;
}

function stripUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return mergeDeep({}, value);
}

function readEnv(env: Env): Record<string, unknown> {
  const sharedLimit = {
    calls: envValue(env, 'RATE_LIMIT_CALLS') ?? DEFAULT_CONFIG.rateLimitCalls,
    windowMs: envValue(env, 'RATE_LIMIT_WINDOW_MS') ?? DEFAULT_CONFIG.rateLimitWindowMs,
    maxConcurrent: envValue(env, 'RATE_LIMIT_MAX_CONCURRENT') ?? DEFAULT_CONFIG.rateLimitMaxConcurrent,
  };
  const countries = envValue(env, 'META_COUNTRIES');

  return stripUndefined({
    maxRounds: envValue(env, 'MAX_ROUNDS'),
    maxQueriesPerRound: envValue(env, 'MAX_QUERIES_PER_ROUND'),
    enableAdEnrichment: envValue(env, 'ENABLE_AD_ENRICHMENT'),
    timeouts: { defaultMs: envValue(env, 'STATE_TIMEOUT_MS') },
    rateLimitPerSource: {
      retrieval: sharedLimit,
      extraction: sharedLimit,
      advertising: {
        calls: envValue(env, 'META_RATE_LIMIT_CALLS') ?? DEFAULT_CONFIG.metaRateLimitCalls,
        windowMs: 3_600_000,
        maxConcurrent: 2,
      },
    },
    retry: { maxAttempts: envValue(env, 'RETRY_MAX_ATTEMPTS') },
    retrieval: {
      apiKey: envValue(env, 'FIRECRAWL_API_KEY'),
      apiUrl: envValue(env, 'FIRECRAWL_API_URL'),
    },
    llm: {
      apiKey: envValue(env, 'ANTHROPIC_API_KEY'),
      model: envValue(env, 'ANTHROPIC_MODEL'),
    },
    meta: {
      accessToken: envValue(env, 'META_API_ACCESS_TOKEN'),
      apiVersion: envValue(env, 'META_API_VERSION'),
      countries: countries?.split(',').map((c) => c.trim().toUpperCase()).filter((c) => c.length > 0),
      adLimit: envValue(env, 'META_AD_LIMIT'),
    },
    storage: {
      bucket: envValue(env, 'S3_BUCKET'),
      region: envValue(env, 'AWS_REGION'),
    },
    sender: {
      name: envValue(env, 'SENDER_NAME'),
      company: envValue(env, 'SENDER_COMPANY'),
      role: envValue(env, 'SENDER_ROLE'),
      offering: envValue(env, 'SENDER_OFFERING'),
      tone: envValue(env, 'EMAIL_TONE'),
      length: envValue(env, 'EMAIL_LENGTH'),
      callToAction: envValue(env, 'EMAIL_CALL_TO_ACTION'),
    },
  });
}

/**
 * Load and validate pipeline configuration
 *
 * @throws ResearchError with code CONFIG_INVALID when validation fails
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): Readonly<PipelineConfig> {
  const raw = mergeDeep(readEnv(env), { ...overrides });
  const result = PipelineConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ResearchError('CONFIG_INVALID', `Invalid pipeline configuration: ${errors.join('; ')}`, {
      details: errors,
    });
  }

  return Object.freeze(result.data);
}

/**
 * Wall-clock timeout for one orchestrator state
 */
export function stateTimeout(config: Pick<PipelineConfig, 'timeouts'>, state: TimedState): number {
  return config.timeouts.perState[state] ?? config.timeouts.defaultMs;
}

export default {
  loadConfig,
  stateTimeout,
  DEFAULT_CONFIG,
};

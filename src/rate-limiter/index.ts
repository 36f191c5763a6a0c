/**
 * Rate Limiter / Retry Policy Module
 *
 * Shared by every external call in the pipeline:
 * - RateLimiter: fixed-window call budget plus an in-flight cap per source
 * - executeWithRetry: exponential backoff with full jitter for retryable failures
 * - ExternalCallPolicy: both composed; each attempt consumes a window slot
 *
 * Terminal failures (credential, malformed request) propagate immediately.
 * Calls are never dropped: they succeed, fail with a typed error, or are
 * cancelled through their AbortSignal.
 */

import pLimit from 'p-limit';
import {
  ResearchError,
  RetryExhaustedError,
  classifyError,
} from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, noopMetrics } from '../observability/index.js';
import type { PipelineConfig, RateLimitSettings, RetrySettings, SourceName } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TimingDeps {
  /** Clock in epoch milliseconds */
  now?: () => number;
  sleep?: SleepFn;
  /** Uniform random in [0, 1), used for jitter */
  random?: () => number;
  logger?: Logger;
  metrics?: Metrics;
}

export interface RetryOptions extends RetrySettings {
  label: string;
  signal?: AbortSignal;
}

// ============================================================================
// Utilities
// ============================================================================

function cancelledError(label: string): ResearchError {
  return new ResearchError('CANCELLED', `${label} cancelled`, { retryable: false });
}

/**
 * Sleep that rejects with CANCELLED when the signal aborts
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError('wait'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelledError('wait'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function throwIfAborted(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) {
    throw cancelledError(label);
  }
}

/**
 * Settle with `promise`, or reject with CANCELLED as soon as `signal` aborts.
 * The underlying call is not awaited after cancellation.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, label: string): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // abandoned call: a late rejection is not observed
    promise.catch(() => undefined);
    return Promise.reject(cancelledError(label));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelledError(label));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Full-jitter exponential backoff: random in [0, min(maxDelay, base * 2^(attempt-1)))
 */
export function computeBackoff(
  attempt: number,
  settings: Pick<RetrySettings, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(settings.maxDelayMs, settings.baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

// ============================================================================
// Rate Limiter
// ============================================================================

/**
 * Per-source limiter: at most `calls` starts per `windowMs` and at most
 * `maxConcurrent` calls in flight. The window check and slot reservation
 * happen synchronously, so concurrent callers cannot overbook.
 */
export class RateLimiter {
  private readonly started: number[] = [];
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor(
    readonly source: string,
    private readonly settings: RateLimitSettings,
    deps: TimingDeps = {}
  ) {
    this.limit = pLimit(settings.maxConcurrent);
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? abortableSleep;
    this.logger = deps.logger ?? createLogger('rate-limiter');
  }

  /** Calls currently executing */
  get inFlight(): number {
    return this.limit.activeCount;
  }

  /** Calls waiting for a concurrency slot */
  get queued(): number {
    return this.limit.pendingCount;
  }

  schedule<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.limit(async () => {
      throwIfAborted(signal, `${this.source} call`);
      await this.acquireSlot(signal);
      return fn();
    });
  }

  private async acquireSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const now = this.now();
      while (this.started.length > 0 && (this.started[0] ?? 0) <= now - this.settings.windowMs) {
        this.started.shift();
      }

      if (this.started.length < this.settings.calls) {
        this.started.push(now);
        return;
      }

      const oldest = this.started[0] ?? now;
      const waitMs = Math.max(1, oldest + this.settings.windowMs - now);
      this.logger.debug('Rate limit window full, waiting', { source: this.source, waitMs });
      await this.sleep(waitMs, signal);
    }
  }
}

// ============================================================================
// Retry
// ============================================================================

/**
 * Run `fn` with retries for retryable failures
 *
 * @throws ResearchError for terminal failures and cancellation,
 *         RetryExhaustedError once every attempt has failed
 */
export async function executeWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
  deps: TimingDeps = {}
): Promise<T> {
  const sleep = deps.sleep ?? abortableSleep;
  const random = deps.random ?? Math.random;
  const logger = deps.logger ?? createLogger('rate-limiter');
  const metrics = deps.metrics ?? noopMetrics;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal, options.label);
    try {
      return await fn(attempt);
    } catch (error) {
      const classified = classifyError(error, options.label);

      if (classified.code === 'CANCELLED' || !classified.retryable) {
        throw classified;
      }

      if (attempt >= options.maxAttempts) {
        metrics.increment('rate_limiter.retry_exhausted', { label: options.label, code: classified.code });
        throw new RetryExhaustedError(classified, attempt);
      }

      const backoff = computeBackoff(attempt, options, random);
      const delay = classified.retryAfterMs !== undefined
        ? Math.max(backoff, Math.min(classified.retryAfterMs, options.maxDelayMs))
        : backoff;

      logger.warn(`Retryable failure, retrying in ${delay}ms`, {
        label: options.label,
        attempt,
        code: classified.code,
        error: classified.message,
      });
      metrics.increment('rate_limiter.retry', { label: options.label, code: classified.code });
      await sleep(delay, options.signal);
    }
  }
}

// ============================================================================
// External Call Policy
// ============================================================================

/**
 * Limiter plus retry for one external source
 */
export class ExternalCallPolicy {
  constructor(
    readonly limiter: RateLimiter,
    private readonly retry: RetrySettings,
    private readonly deps: TimingDeps = {}
  ) {}

  get source(): string {
    return this.limiter.source;
  }

  run<T>(label: string, fn: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return executeWithRetry(
      () => this.limiter.schedule(() => fn(signal), signal),
      { ...this.retry, label: `${this.source}:${label}`, signal },
      this.deps
    );
  }
}

export type CallPolicies = Readonly<Record<SourceName, ExternalCallPolicy>>;

/**
 * Build one call policy per external source from configuration
 */
export function createCallPolicies(
  config: Pick<PipelineConfig, 'rateLimitPerSource' | 'retry'>,
  deps: TimingDeps = {}
): CallPolicies {
  const build = (source: SourceName): ExternalCallPolicy =>
    new ExternalCallPolicy(new RateLimiter(source, config.rateLimitPerSource[source], deps), config.retry, deps);

  return Object.freeze({
    retrieval: build('retrieval'),
    extraction: build('extraction'),
    advertising: build('advertising'),
  });
}

export default {
  RateLimiter,
  ExternalCallPolicy,
  executeWithRetry,
  computeBackoff,
  createCallPolicies,
  abortableSleep,
};

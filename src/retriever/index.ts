/**
 * Content Retriever Module
 *
 * Runs one round's queries against a retrieval source through the
 * retrieval call policy.
 *
 * Key behaviors:
 * - A failing query is logged as RETRIEVAL_FAILED and excluded
 * - The batch fails (BATCH_EMPTY) only when every query fails
 * - Items are ordered by query issue order, then source order
 * - On abort, in-flight queries are recorded as CANCELLED; completed ones are kept
 */

import axios, { type AxiosInstance } from 'axios';
import { ResearchError, classifyError, type ResearchErrorCode } from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, noopMetrics } from '../observability/index.js';
import { raceAbort, type ExternalCallPolicy } from '../rate-limiter/index.js';
import type { PipelineConfig } from '../config/index.js';
import type { ContentItem, ModuleResult, Query, RunId } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Retrieval source capability
 */
export interface RetrievalSource {
  readonly name: string;
  search(query: Query, signal?: AbortSignal): Promise<ContentItem[]>;
}

export interface QueryFailure {
  queryId: string;
  /** RETRIEVAL_FAILED, or CANCELLED when the state timed out */
  code: 'RETRIEVAL_FAILED' | 'CANCELLED';
  cause: ResearchErrorCode;
  message: string;
}

/**
 * One round's retrieved content
 */
export interface RetrievalBatch {
  id: string;
  round: number;
  queryIds: string[];
  items: ContentItem[];
  failures: QueryFailure[];
  cancelled: boolean;
}

export interface RetrieveOptions {
  batchId: string;
  round: number;
  runId?: RunId;
  signal?: AbortSignal;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * Retrieve content for a set of queries
 *
 * @returns ModuleResult holding the batch; `success: false` with BATCH_EMPTY
 *          when every query failed (the batch is still attached as details)
 */
export async function retrieveContent(
  queries: readonly Query[],
  source: RetrievalSource,
  policy: ExternalCallPolicy,
  options: RetrieveOptions
): Promise<ModuleResult<RetrievalBatch>> {
  const logger = options.logger ?? createLogger('retriever');
  const metrics = options.metrics ?? noopMetrics;
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const runId = options.runId ?? '';

  const ordered = [...queries].sort((a, b) => a.issueIndex - b.issueIndex);

  logger.info('Retrieving content', { runId, round: options.round, queries: ordered.length, source: source.name });
  metrics.increment('retriever.batch.started', { source: source.name });

  const settled = await Promise.allSettled(
    ordered.map((query) =>
      raceAbort(
        policy.run('search', (signal) => source.search(query, signal), options.signal),
        options.signal,
        `search "${query.text}"`
      )
    )
  );

  const items: ContentItem[] = [];
  const failures: QueryFailure[] = [];
  const seenUrls = new Set<string>();

  settled.forEach((outcome, index) => {
    const query = ordered[index];
    if (!query) {
      return;
    }

    if (outcome.status === 'fulfilled') {
      for (const item of outcome.value) {
        if (item.text.trim().length === 0 || seenUrls.has(item.sourceUrl)) {
          continue;
        }
        seenUrls.add(item.sourceUrl);
        items.push({ ...item, queryId: query.id });
      }
      return;
    }

    const error = classifyError(outcome.reason, `search "${query.text}"`);
    const code = error.code === 'CANCELLED' ? 'CANCELLED' : 'RETRIEVAL_FAILED';
    failures.push({ queryId: query.id, code, cause: error.code, message: error.message });

    logger.warn(code === 'CANCELLED' ? 'Query cancelled' : 'RETRIEVAL_FAILED', {
      runId,
      queryId: query.id,
      query: query.text,
      cause: error.code,
      error: error.message,
    });
    metrics.increment('retriever.query.failed', { source: source.name, cause: error.code });
  });

  const batch: RetrievalBatch = {
    id: options.batchId,
    round: options.round,
    queryIds: ordered.map((query) => query.id),
    items,
    failures,
    cancelled: options.signal?.aborted ?? false,
  };

  metrics.timing('retriever.batch.duration', Date.now() - startTime, { source: source.name });
  metrics.gauge('retriever.batch.items', items.length, { source: source.name });

  if (ordered.length > 0 && failures.length === ordered.length) {
    logger.error('All queries in batch failed', { runId, round: options.round, batchId: batch.id });
    return {
      success: false,
      error: {
        code: 'BATCH_EMPTY',
        message: `All ${ordered.length} queries in round ${options.round} failed`,
        details: batch,
      },
      metadata: {
        runId,
        module: 'retriever',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  logger.info('Retrieval completed', {
    runId,
    round: options.round,
    items: items.length,
    failed: failures.length,
  });

  return {
    success: true,
    data: batch,
    metadata: {
      runId,
      module: 'retriever',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

// ============================================================================
// Firecrawl Source
// ============================================================================

interface FirecrawlSearchResponse {
  success: boolean;
  data?: Array<{
    url?: string;
    title?: string;
    description?: string;
    markdown?: string;
    metadata?: {
      title?: string;
      sourceURL?: string;
    };
  }>;
  error?: string;
}

export interface FirecrawlSourceSettings {
  apiKey?: string;
  apiUrl: string;
  maxResultsPerQuery: number;
  timeoutMs: number;
  /** Per-item character cap */
  maxItemChars: number;
}

/**
 * Web search with markdown scrape of each hit, via Firecrawl /v1/search
 */
export class FirecrawlRetrievalSource implements RetrievalSource {
  readonly name = 'firecrawl';
  private readonly client: AxiosInstance;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly settings: FirecrawlSourceSettings,
    deps: { client?: AxiosInstance; logger?: Logger; now?: () => Date } = {}
  ) {
    this.logger = deps.logger ?? createLogger('retriever');
    this.now = deps.now ?? (() => new Date());

    if (deps.client) {
      this.client = deps.client;
    } else {
      if (!settings.apiKey) {
        throw new ResearchError('CREDENTIAL_INVALID', 'FIRECRAWL_API_KEY is required. Set it in config or environment variable.');
      }
      this.client = axios.create({
        baseURL: settings.apiUrl,
        timeout: settings.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${settings.apiKey}`,
        },
      });
    }
  }

  async search(query: Query, signal?: AbortSignal): Promise<ContentItem[]> {
    this.logger.debug('Searching', { query: query.text });

    const response = await this.client.post<FirecrawlSearchResponse>(
      '/v1/search',
      {
        query: query.text,
        limit: this.settings.maxResultsPerQuery,
        scrapeOptions: {
          formats: ['markdown'],
          onlyMainContent: true,
        },
      },
      { signal }
    );

    if (!response.data.success) {
      throw new ResearchError('UNAVAILABLE', `Search failed: ${response.data.error ?? 'Unknown error'}`);
    }

    const retrievedAt = this.now().toISOString();
    const items: ContentItem[] = [];
    for (const hit of response.data.data ?? []) {
      const sourceUrl = hit.url ?? hit.metadata?.sourceURL;
      const text = (hit.markdown ?? hit.description ?? '').trim();
      if (!sourceUrl || text.length === 0) {
        continue;
      }
      items.push({
        queryId: query.id,
        sourceUrl,
        title: hit.title ?? hit.metadata?.title ?? null,
        text: text.length > this.settings.maxItemChars ? text.slice(0, this.settings.maxItemChars) : text,
        retrievedAt,
      });
    }
    return items;
  }
}

/**
 * Build the default retrieval source from configuration
 */
export function createRetrievalSource(
  config: Pick<PipelineConfig, 'retrieval' | 'extraction'>,
  logger?: Logger
): RetrievalSource {
  return new FirecrawlRetrievalSource(
    {
      apiKey: config.retrieval.apiKey,
      apiUrl: config.retrieval.apiUrl,
      maxResultsPerQuery: config.retrieval.maxResultsPerQuery,
      timeoutMs: config.retrieval.timeoutMs,
      maxItemChars: config.extraction.maxItemChars,
    },
    { logger }
  );
}

export default {
  retrieveContent,
  FirecrawlRetrievalSource,
  createRetrievalSource,
};

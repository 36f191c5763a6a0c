/**
 * Pipeline Entry Module
 *
 * Wires configuration, the default adapters, storage and the run manager
 * around the orchestrator, then hands the finished record to downstream
 * consumers.
 *
 * Usage:
 * ```typescript
 * const result = await researchCompany({ url: 'https://example.com' });
 * if (result.success) console.log(result.data?.record.quality.overall);
 *
 * const results = await researchCompanies([{ url: 'a.com' }, { name: 'B Corp' }], { concurrency: 2 });
 * ```
 */

import pLimit from 'p-limit';
import { ResearchError, RunFailedError, classifyError } from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, errorMessage, noopMetrics } from '../observability/index.js';
import { loadConfig, type ConfigOverrides, type Env, type PipelineConfig } from '../config/index.js';
import { normalizeTarget } from '../normalizer/index.js';
import { createCallPolicies, type CallPolicies } from '../rate-limiter/index.js';
import type { ProfileSchema } from '../schema/index.js';
import { createRetrievalSource, type RetrievalSource } from '../retriever/index.js';
import { ClaudeExtractionCapability, type ExtractionCapability } from '../extractor/index.js';
import { ClaudeClient, type LanguageModel } from '../llm/index.js';
import { getAdDataSource, type AdDataSource } from '../enrichment/index.js';
import { runResearch } from '../orchestrator/index.js';
import { createStorageAdapter } from '../storage/index.js';
import {
  createRun,
  generateRunId,
  loadResearchRecord,
  markArtifactComplete,
  recordConsumerResult,
  saveResearchRecord,
  updateRunStatus,
} from '../run-manager/index.js';
import { OutreachDrafter } from '../outreach/index.js';
import type {
  DownstreamConsumer,
  ModuleResult,
  ProgressObserver,
  ResearchRecord,
  RunId,
  StorageAdapter,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  /** Fully loaded configuration; otherwise loaded from `env` and `overrides` */
  config?: Readonly<PipelineConfig>;
  env?: Env;
  overrides?: ConfigOverrides;
  retrievalSource?: RetrievalSource;
  extraction?: ExtractionCapability;
  /** `null` disables the live advertising source */
  adSource?: AdDataSource | null;
  languageModel?: LanguageModel;
  storage?: StorageAdapter;
  /** Replaces the default consumers */
  consumers?: DownstreamConsumer[];
  /** Draft an outreach email with the default consumer (default true) */
  draftOutreach?: boolean;
  observer?: ProgressObserver;
  schema?: ProfileSchema;
  policies?: CallPolicies;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

export interface BatchOptions extends PipelineOptions {
  /** Targets researched at the same time (default 2) */
  concurrency?: number;
}

export interface ConsumerOutcome {
  name: string;
  success: boolean;
  error?: string;
}

export interface PipelineOutcome {
  record: ResearchRecord;
  /** True when the record came from an earlier invocation in the same window */
  reused: boolean;
  consumers: ConsumerOutcome[];
}

// ============================================================================
// Entry Point
// ============================================================================

function failed(code: string, message: string, runId: RunId, startTime: number, details?: unknown): ModuleResult<PipelineOutcome> {
  return {
    success: false,
    error: { code, message, details },
    metadata: { runId, module: 'pipeline', timestamp: new Date().toISOString(), duration: Date.now() - startTime },
  };
}

async function deliver(
  record: ResearchRecord,
  consumers: readonly DownstreamConsumer[],
  storage: StorageAdapter,
  logger: Logger
): Promise<ConsumerOutcome[]> {
  const outcomes: ConsumerOutcome[] = [];
  for (const consumer of consumers) {
    let outcome: ConsumerOutcome;
    try {
      await consumer.consume(record);
      outcome = { name: consumer.name, success: true };
    } catch (error) {
      outcome = { name: consumer.name, success: false, error: errorMessage(error) };
      logger.warn('Downstream consumer failed', { runId: record.runId, consumer: consumer.name, error: outcome.error });
    }
    outcomes.push(outcome);

    const recorded = await recordConsumerResult(record.runId, consumer.name, outcome, storage);
    if (!recorded.success) {
      logger.warn('Could not record consumer result', { runId: record.runId, consumer: consumer.name });
    }
  }
  return outcomes;
}

/**
 * Research one company end to end
 *
 * @param input - raw request `{ url?, name?, notes? }`
 * @returns ModuleResult with the record and consumer outcomes; RUN_FAILED
 *          carries the last-known run state in `error.details`
 */
export async function researchCompany(input: unknown, options: PipelineOptions = {}): Promise<ModuleResult<PipelineOutcome>> {
  const startTime = Date.now();
  const logger = options.logger ?? createLogger('pipeline');
  const metrics = options.metrics ?? noopMetrics;
  const now = options.now ?? (() => new Date());

  const normalized = normalizeTarget(input);
  if (!normalized.success || !normalized.data) {
    return failed(
      normalized.error?.code ?? 'VALIDATION_ERROR',
      normalized.error?.message ?? 'Invalid research target',
      '',
      startTime,
      normalized.error?.details
    );
  }
  const target = normalized.data;

  let config: Readonly<PipelineConfig>;
  try {
    config = options.config ?? loadConfig(options.env, options.overrides);
  } catch (error) {
    const classified = classifyError(error, 'configuration');
    return failed(classified.code, classified.message, '', startTime, classified.details);
  }

  const runId = generateRunId(target, now(), config.idempotencyWindowMinutes);
  const storage = options.storage ?? createStorageAdapter(config);

  const run = await createRun(runId, target, storage);
  if (!run.success || !run.data) {
    return failed(run.error?.code ?? 'RUN_CREATION_ERROR', run.error?.message ?? 'Failed to create run', runId, startTime);
  }

  if (run.data.reused) {
    try {
      const record = await loadResearchRecord(runId, storage);
      logger.info('Run already finished in this window, returning stored record', { runId, status: record.status });
      metrics.increment('pipeline.run.reused');
      return {
        success: true,
        data: { record, reused: true, consumers: [] },
        metadata: { runId, module: 'pipeline', timestamp: new Date().toISOString(), duration: Date.now() - startTime },
      };
    } catch (error) {
      logger.warn('Stored record unreadable, running again', { runId, error: errorMessage(error) });
    }
  }

  let record: ResearchRecord;
  let consumers: readonly DownstreamConsumer[];
  try {
    const policies = options.policies ?? createCallPolicies(config, { logger, metrics });
    let model = options.languageModel;
    const languageModel = (): LanguageModel => {
      if (!model) {
        model = new ClaudeClient(config.llm, { logger, metrics });
      }
      return model;
    };

    const extraction =
      options.extraction ??
      new ClaudeExtractionCapability(languageModel(), { maxItemChars: config.extraction.maxItemChars });
    const retrievalSource = options.retrievalSource ?? createRetrievalSource(config, logger);
    const adSource = options.adSource === undefined ? getAdDataSource(config, logger) : options.adSource;

    consumers =
      options.consumers ??
      (options.draftOutreach === false
        ? []
        : [new OutreachDrafter(languageModel(), config.sender, { policy: policies.extraction, storage, logger, metrics })]);

    record = await runResearch(target, config, {
      retrievalSource,
      extraction,
      adSource,
      policies,
      schema: options.schema,
      observer: options.observer,
      runId,
      logger,
      metrics,
      now,
    });
  } catch (error) {
    if (error instanceof RunFailedError) {
      await updateRunStatus(runId, 'failed', storage, { error: error.message });
      return failed('RUN_FAILED', error.message, runId, startTime, { lastState: error.lastState });
    }
    const classified = error instanceof ResearchError ? error : classifyError(error, 'pipeline setup');
    await updateRunStatus(runId, 'failed', storage, { error: classified.message });
    return failed(classified.code, classified.message, runId, startTime, classified.details);
  }

  try {
    await saveResearchRecord(record, storage);
  } catch (error) {
    logger.error('Failed to store research record', { runId, error: errorMessage(error) });
    return failed('STORAGE_ERROR', `Failed to store research record: ${errorMessage(error)}`, runId, startTime, { record });
  }
  await markArtifactComplete(runId, 'record', storage);
  const updated = await updateRunStatus(runId, record.status, storage, {
    qualityOverall: record.quality.overall,
    schemaVersion: record.schemaVersion,
  });
  if (!updated.success) {
    logger.warn('Could not update run artifact', { runId, error: updated.error?.message });
  }

  const consumerOutcomes = await deliver(record, consumers, storage, logger);

  metrics.increment('pipeline.run.finished', { status: record.status });
  return {
    success: true,
    data: { record, reused: false, consumers: consumerOutcomes },
    metadata: { runId, module: 'pipeline', timestamp: new Date().toISOString(), duration: Date.now() - startTime },
  };
}

// ============================================================================
// Batch
// ============================================================================

const DEFAULT_BATCH_CONCURRENCY = 2;

/**
 * Research several companies, each as its own run.
 *
 * All runs share one configuration, call policies and storage, so the
 * per-source rate limits hold across the whole batch. One target failing
 * never affects the others; results come back in input order.
 */
export async function researchCompanies(
  inputs: readonly unknown[],
  options: BatchOptions = {}
): Promise<ModuleResult<PipelineOutcome>[]> {
  const startTime = Date.now();
  const { concurrency = DEFAULT_BATCH_CONCURRENCY, ...shared } = options;
  const logger = shared.logger ?? createLogger('pipeline');
  const metrics = shared.metrics ?? noopMetrics;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    const message = `Batch concurrency must be a positive integer, got ${concurrency}`;
    return inputs.map(() => failed('CONFIG_INVALID', message, '', startTime));
  }

  let config: Readonly<PipelineConfig>;
  try {
    config = shared.config ?? loadConfig(shared.env, shared.overrides);
  } catch (error) {
    const classified = classifyError(error, 'configuration');
    return inputs.map(() => failed(classified.code, classified.message, '', startTime, classified.details));
  }

  const perTarget: PipelineOptions = {
    ...shared,
    config,
    logger,
    metrics,
    policies: shared.policies ?? createCallPolicies(config, { logger, metrics }),
    storage: shared.storage ?? createStorageAdapter(config),
  };

  logger.info('Starting batch research', { targets: inputs.length, concurrency });
  const limit = pLimit(concurrency);
  const settled = await Promise.allSettled(inputs.map((input) => limit(() => researchCompany(input, perTarget))));

  const results = settled.map((outcome): ModuleResult<PipelineOutcome> => {
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }
    const classified = classifyError(outcome.reason, 'batch research');
    logger.error('Batch target failed unexpectedly', { error: classified.message });
    return failed(classified.code, classified.message, '', startTime, classified.details);
  });

  const succeeded = results.filter((result) => result.success).length;
  logger.info('Batch research finished', { targets: inputs.length, succeeded, failed: inputs.length - succeeded });
  metrics.increment('pipeline.batch.finished');
  return results;
}

export default {
  researchCompany,
  researchCompanies,
};

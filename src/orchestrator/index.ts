/**
 * Orchestrator Module
 *
 * Drives one research run through its states:
 *
 *   INIT -> PLANNING -> RETRIEVING -> EXTRACTING -> REFLECTING
 *        -> (PLANNING ...) -> ENRICHING -> SCORING -> DONE
 *
 * Any state may move to FAILED on an unrecoverable error.
 *
 * Key behaviors:
 * - The orchestrator is the only owner of RunState; every transition
 *   replaces the frozen state value
 * - Rounds are bounded by `maxRounds`; an exhausted budget ends `partial`
 * - At most one extraction per retrieved batch, exactly one enrichment call
 * - Per-state wall-clock timeouts cancel in-flight calls and cap the run at `partial`
 * - An empty profile at the end of the run raises RunFailedError
 */

import { RunFailedError, classifyError } from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, errorMessage, noopMetrics } from '../observability/index.js';
import type { CallPolicies } from '../rate-limiter/index.js';
import { stateTimeout, type PipelineConfig, type TimedState } from '../config/index.js';
import { loadDefaultSchema, type ProfileSchema } from '../schema/index.js';
import { deepFreeze, emptyProfile, isProfileEmpty, mergeFragment } from '../profile/index.js';
import { analyzeGaps, planQueries } from '../planner/index.js';
import { retrieveContent, type RetrievalBatch, type RetrievalSource } from '../retriever/index.js';
import { extractFragment, type ExtractionCapability } from '../extractor/index.js';
import { adFragmentFromIntelligence, enrichAdvertising, type AdDataSource } from '../enrichment/index.js';
import { computeQualityScore } from '../scoring/index.js';
import type {
  OrchestratorState,
  ProfileFragment,
  ProgressEvent,
  ProgressObserver,
  ResearchRecord,
  ResearchTarget,
  RoundRecord,
  RunId,
  RunState,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type OrchestratorConfig = Pick<
  PipelineConfig,
  | 'maxRounds'
  | 'maxQueriesPerRound'
  | 'enableAdEnrichment'
  | 'lowCoverageThreshold'
  | 'timeouts'
  | 'extraction'
  | 'sophistication'
  | 'meta'
>;

export interface OrchestratorDeps {
  retrievalSource: RetrievalSource;
  extraction: ExtractionCapability;
  /** Null when no advertising source is configured */
  adSource: AdDataSource | null;
  policies: CallPolicies;
  schema?: ProfileSchema;
  observer?: ProgressObserver;
  runId?: RunId;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

interface TimedOutcome<T> {
  value: T;
  timedOut: boolean;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class ResearchOrchestrator {
  private state: RunState;
  private sequence = 0;
  private enrichmentCalls = 0;
  private readonly schema: ProfileSchema;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly now: () => Date;

  constructor(
    target: ResearchTarget,
    private readonly config: OrchestratorConfig,
    private readonly deps: OrchestratorDeps
  ) {
    this.schema = deps.schema ?? loadDefaultSchema();
    this.logger = deps.logger ?? createLogger('orchestrator');
    this.metrics = deps.metrics ?? noopMetrics;
    this.now = deps.now ?? (() => new Date());

    const initial: RunState = {
      runId: deps.runId ?? `run_${target.key}`,
      target,
      schemaVersion: this.schema.version,
      status: 'pending',
      phase: 'INIT',
      round: 0,
      profile: emptyProfile(),
      issuedQueries: [],
      unresolvableSections: [],
      rounds: [],
      extractedBatchIds: [],
      adIntelligence: null,
      quality: null,
      timedOutStates: [],
      errors: [],
      startedAt: this.now().toISOString(),
      completedAt: null,
    };
    this.state = deepFreeze(initial);
  }

  /** Current (frozen) run state */
  get snapshot(): RunState {
    return this.state;
  }

  /**
   * Run to a terminal state
   *
   * @throws RunFailedError when no usable profile data was obtained
   */
  async run(): Promise<ResearchRecord> {
    const startTime = Date.now();
    this.logger.info('Research run started', {
      runId: this.state.runId,
      target: this.state.target.key,
      maxRounds: this.config.maxRounds,
    });
    this.metrics.increment('orchestrator.run.started');

    try {
      await this.emit('INIT');
      await this.researchLoop();
      await this.enrich();
      return await this.finish(startTime);
    } catch (error) {
      if (error instanceof RunFailedError) {
        throw error;
      }
      const classified = classifyError(error, 'research run');
      throw await this.fail(`Unrecoverable error in ${this.state.phase}: ${classified.message}`);
    }
  }

  // ==========================================================================
  // Rounds
  // ==========================================================================

  private async researchLoop(): Promise<void> {
    while (this.state.round < this.config.maxRounds) {
      await this.transition('PLANNING');
      const round = this.state.round + 1;
      const plan = planQueries({
        target: this.state.target,
        profile: this.state.profile,
        schema: this.schema,
        round,
        issued: this.state.issuedQueries,
        unresolvable: this.state.unresolvableSections,
        maxQueries: this.config.maxQueriesPerRound,
        lowCoverageThreshold: this.config.lowCoverageThreshold,
      });

      if (plan.newlyUnresolvable.length > 0) {
        this.logger.warn('Sections marked unresolvable', {
          runId: this.state.runId,
          sections: plan.newlyUnresolvable,
        });
        this.update({ unresolvableSections: [...this.state.unresolvableSections, ...plan.newlyUnresolvable] });
      }

      if (plan.queries.length === 0) {
        this.logger.info('No queries to issue, leaving research loop', {
          runId: this.state.runId,
          gaps: plan.gaps.length,
        });
        return;
      }

      this.update({ round, issuedQueries: [...this.state.issuedQueries, ...plan.queries] });

      await this.transition('RETRIEVING');
      const batchId = `${this.state.runId}:r${round}`;
      const retrieval = await this.withStateTimeout('RETRIEVING', (signal) =>
        retrieveContent(plan.queries, this.deps.retrievalSource, this.deps.policies.retrieval, {
          batchId,
          round,
          runId: this.state.runId,
          signal,
          logger: this.logger,
          metrics: this.metrics,
        })
      );

      const degradedReasons: string[] = [];
      let batch: RetrievalBatch;
      if (retrieval.value.success && retrieval.value.data) {
        batch = retrieval.value.data;
      } else {
        degradedReasons.push(retrieval.value.error?.code ?? 'BATCH_EMPTY');
        batch = {
          id: batchId,
          round,
          queryIds: plan.queries.map((query) => query.id),
          items: [],
          failures: [],
          cancelled: retrieval.timedOut,
        };
      }
      const failedQueryIds = retrieval.value.success
        ? batch.failures.map((failure) => failure.queryId)
        : [...batch.queryIds];

      await this.transition('EXTRACTING');
      const fragment = degradedReasons.length > 0 ? null : await this.extractOnce(batch);
      if (fragment) {
        if (fragment.degraded) {
          degradedReasons.push(fragment.degradedReason ?? 'EXTRACTION_PARSE_ERROR');
        }
        this.update({ profile: mergeFragment(this.state.profile, fragment) });
      }

      await this.transition('REFLECTING');
      const gaps = analyzeGaps(this.state.profile, this.schema, {
        excluded: this.state.unresolvableSections,
        lowCoverageThreshold: this.config.lowCoverageThreshold,
      });
      const budgetExhausted = gaps.length > 0 && round >= this.config.maxRounds;

      const record: RoundRecord = {
        round,
        queryIds: plan.queries.map((query) => query.id),
        itemsRetrieved: batch.items.length,
        failedQueryIds,
        fragmentId: fragment?.id ?? null,
        degraded: degradedReasons.length > 0,
        degradedReasons,
        gapsAfter: gaps.map((gap) => gap.section),
        budgetExhausted,
      };
      this.update({
        rounds: [...this.state.rounds, record],
        errors: [...this.state.errors, ...degradedReasons.map((reason) => `round ${round}: ${reason}`)],
      });

      this.logger.info('Round completed', {
        runId: this.state.runId,
        round,
        items: record.itemsRetrieved,
        degraded: record.degraded,
        gaps: record.gapsAfter,
      });
      this.metrics.increment('orchestrator.round.completed', { degraded: String(record.degraded) });

      if (gaps.length === 0) {
        return;
      }
      if (budgetExhausted) {
        this.logger.warn('Round budget exhausted with gaps remaining', {
          runId: this.state.runId,
          gaps: record.gapsAfter,
        });
      }
    }
  }

  private async extractOnce(batch: RetrievalBatch): Promise<ProfileFragment | null> {
    if (this.state.extractedBatchIds.includes(batch.id)) {
      this.logger.warn('Batch already extracted, skipping', { runId: this.state.runId, batchId: batch.id });
      return null;
    }
    this.update({ extractedBatchIds: [...this.state.extractedBatchIds, batch.id] });

    const snapshot = { target: this.state.target, profile: this.state.profile, round: this.state.round };
    const outcome = await this.withStateTimeout('EXTRACTING', (signal) =>
      extractFragment(batch, snapshot, this.schema, this.deps.extraction, {
        policy: this.deps.policies.extraction,
        maxRetries: this.config.extraction.maxRetries,
        signal,
        logger: this.logger,
        metrics: this.metrics,
      })
    );
    return outcome.value;
  }

  // ==========================================================================
  // Enrichment, scoring and termination
  // ==========================================================================

  private async enrich(): Promise<void> {
    await this.transition('ENRICHING');
    if (this.enrichmentCalls > 0) {
      return;
    }
    this.enrichmentCalls += 1;

    const outcome = await this.withStateTimeout('ENRICHING', (signal) =>
      enrichAdvertising(
        this.state.target,
        {
          enabled: this.config.enableAdEnrichment,
          credential: this.config.meta.accessToken,
          sophistication: this.config.sophistication,
        },
        {
          source: this.deps.adSource,
          policy: this.deps.policies.advertising,
          signal,
          logger: this.logger,
          metrics: this.metrics,
          now: this.now,
        }
      )
    );

    const adIntelligence = outcome.value;
    const adFragment = adFragmentFromIntelligence(adIntelligence, this.schema);
    this.update({
      adIntelligence,
      profile: adFragment ? mergeFragment(this.state.profile, adFragment) : this.state.profile,
    });
  }

  private async finish(startTime: number): Promise<ResearchRecord> {
    if (isProfileEmpty(this.state.profile)) {
      throw await this.fail(`No profile data obtained after ${this.state.round} round(s)`);
    }

    await this.transition('SCORING');
    const quality = computeQualityScore(this.state.profile, this.schema, this.state.adIntelligence, this.now());

    const outstanding = analyzeGaps(this.state.profile, this.schema, {
      lowCoverageThreshold: this.config.lowCoverageThreshold,
    });
    const status = outstanding.length === 0 && this.state.timedOutStates.length === 0 ? 'completed' : 'partial';

    this.update({ quality, status, completedAt: this.now().toISOString() });
    await this.transition('DONE');

    const state = this.state;
    if (!state.adIntelligence || !state.quality || !state.completedAt) {
      throw await this.fail('Run reached DONE without enrichment or score');
    }

    this.logger.info('Research run finished', {
      runId: state.runId,
      status,
      rounds: state.round,
      quality: quality.overall,
      adMode: state.adIntelligence.mode,
      duration: Date.now() - startTime,
    });
    this.metrics.increment('orchestrator.run.finished', { status });
    this.metrics.timing('orchestrator.run.duration', Date.now() - startTime, { status });

    const record: ResearchRecord = {
      runId: state.runId,
      schemaVersion: state.schemaVersion,
      target: state.target,
      status,
      profile: state.profile,
      adIntelligence: state.adIntelligence,
      quality: state.quality,
      rounds: state.rounds,
      issuedQueries: state.issuedQueries,
      startedAt: state.startedAt,
      completedAt: state.completedAt,
    };
    return deepFreeze(record);
  }

  private async fail(message: string): Promise<RunFailedError> {
    this.update({
      status: 'failed',
      errors: [...this.state.errors, message],
      completedAt: this.now().toISOString(),
    });
    await this.transition('FAILED');
    this.logger.error('Research run failed', { runId: this.state.runId, error: message });
    this.metrics.increment('orchestrator.run.failed');
    return new RunFailedError(message, this.state);
  }

  // ==========================================================================
  // State plumbing
  // ==========================================================================

  private update(patch: Partial<RunState>): void {
    this.state = deepFreeze({ ...this.state, ...patch });
  }

  private async transition(phase: OrchestratorState): Promise<void> {
    this.update({ phase });
    await this.emit(phase);
  }

  private async emit(state: OrchestratorState): Promise<void> {
    this.sequence += 1;
    const event: ProgressEvent = {
      sequence: this.sequence,
      runId: this.state.runId,
      state,
      round: this.state.round,
      timestamp: this.now().toISOString(),
    };
    this.logger.debug('Progress', { ...event });

    if (!this.deps.observer) {
      return;
    }
    try {
      await this.deps.observer.onProgress(event);
    } catch (error) {
      this.logger.warn('Progress observer failed', { runId: this.state.runId, state, error: errorMessage(error) });
    }
  }

  /**
   * Run one state's work under its wall-clock timeout. On expiry the signal
   * aborts; the work settles with whatever completed and the state is
   * recorded as timed out.
   */
  private async withStateTimeout<T>(state: TimedState, work: (signal: AbortSignal) => Promise<T>): Promise<TimedOutcome<T>> {
    const controller = new AbortController();
    const timeoutMs = stateTimeout(this.config, state);
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const value = await work(controller.signal);
      const timedOut = controller.signal.aborted;
      if (timedOut) {
        this.logger.warn('State timed out, keeping completed results', {
          runId: this.state.runId,
          state,
          round: this.state.round,
          timeoutMs,
        });
        this.metrics.increment('orchestrator.state.timeout', { state });
        this.update({
          timedOutStates: [...this.state.timedOutStates, state],
          errors: [...this.state.errors, `${state} timed out after ${timeoutMs}ms`],
        });
      }
      return { value, timedOut };
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Run the research pipeline for one target
 */
export function runResearch(
  target: ResearchTarget,
  config: OrchestratorConfig,
  deps: OrchestratorDeps
): Promise<ResearchRecord> {
  return new ResearchOrchestrator(target, config, deps).run();
}

export default {
  ResearchOrchestrator,
  runResearch,
};

/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Generate deterministic RunIDs using SHA-256
 * - Idempotency checks across invocations
 * - Run artifact lifecycle (status, stored artifacts, consumer results)
 * - Persist and reload finished research records
 *
 * RunID algorithm:
 * 1. Round the start time down to the idempotency window
 * 2. Construct input: target_key | rounded_start
 * 3. Hash using SHA-256, keep 16 hex characters
 * 4. Prefix with "run_"
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { ResearchError } from '../errors/index.js';
import type {
  ArtifactType,
  JsonValue,
  ModuleResult,
  ResearchRecord,
  ResearchTarget,
  RunId,
  StorageAdapter,
} from '../types/index.js';

// ============================================================================
// Run Artifact
// ============================================================================

const RUN_ARTIFACT_STATUSES = ['pending', 'running', 'completed', 'partial', 'failed'] as const;
export type RunArtifactStatus = (typeof RUN_ARTIFACT_STATUSES)[number];

const ConsumerResultSchema = z.object({
  status: z.enum(['not_attempted', 'success', 'failed']),
  attempted_at: z.string().nullable(),
  error: z.string().nullable(),
});

const RunArtifactSchema = z.object({
  run_id: z.string(),
  status: z.enum(RUN_ARTIFACT_STATUSES),
  created_at: z.string(),
  completed_at: z.string().nullable(),
  target_key: z.string(),
  schema_version: z.string().nullable(),
  artifacts: z.object({
    target: z.boolean(),
    record: z.boolean(),
    run_artifact: z.boolean(),
    outreach: z.boolean(),
  }),
  consumers: z.record(ConsumerResultSchema),
  quality_overall: z.number().nullable(),
  errors: z.array(z.string()),
});

export type RunArtifact = z.infer<typeof RunArtifactSchema>;
export type ConsumerResult = z.infer<typeof ConsumerResultSchema>;

/**
 * Summary returned to callers of the run manager
 */
export interface RunMetadata {
  runId: RunId;
  createdAt: string;
  status: RunArtifactStatus;
  artifacts: string[];
  /** True when an earlier invocation already finished this run */
  reused: boolean;
  error?: string;
}

// ============================================================================
// Research Record Schema
// ============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const ResearchRecordSchema = z.object({
  runId: z.string(),
  schemaVersion: z.string(),
  target: z.object({
    key: z.string(),
    url: z.string().nullable(),
    domain: z.string().nullable(),
    displayName: z.string(),
    notes: z.string().nullable(),
  }),
  status: z.enum(['completed', 'partial']),
  profile: z.record(z.record(JsonValueSchema)),
  adIntelligence: z.object({
    mode: z.enum(['live', 'fallback']),
    fallbackReason: z
      .enum(['disabled', 'no_credential', 'CREDENTIAL_INVALID', 'RATE_LIMITED', 'UNAVAILABLE', 'TIMEOUT', 'ENRICHMENT_UNAVAILABLE'])
      .nullable(),
    counts: z.object({
      activeAds: z.number(),
      totalAds: z.number(),
      platformDistribution: z.record(z.number()),
    }),
    signals: z.object({
      creativeFormats: z.record(z.number()),
      abTestGroups: z.number(),
      themes: z.array(z.string()),
      latestActivity: z.string().nullable(),
    }),
    summary: z.object({
      advertisingStatus: z.enum(['active_advertiser', 'inactive_advertiser', 'no_ads_found', 'unavailable']),
      sophistication: z.enum(['none', 'low', 'medium', 'high', 'unknown']),
      targetingBreadth: z.enum(['none', 'narrow', 'moderate', 'broad', 'unknown']),
      activeCampaignsSummary: z.string(),
      optimizationOpportunities: z.array(z.string()),
    }),
    producedAt: z.string(),
  }),
  quality: z.object({
    overall: z.number().min(0).max(1),
    sections: z.array(
      z.object({
        section: z.string(),
        label: z.string(),
        weight: z.number(),
        coverage: z.number(),
        score: z.number(),
        populated: z.number(),
        total: z.number(),
      })
    ),
    computedAt: z.string(),
  }),
  rounds: z.array(
    z.object({
      round: z.number(),
      queryIds: z.array(z.string()),
      itemsRetrieved: z.number(),
      failedQueryIds: z.array(z.string()),
      fragmentId: z.string().nullable(),
      degraded: z.boolean(),
      degradedReasons: z.array(z.string()),
      gapsAfter: z.array(z.string()),
      budgetExhausted: z.boolean(),
    })
  ),
  issuedQueries: z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      normalizedText: z.string(),
      origin: z.enum(['seed', 'gap-fill']),
      round: z.number(),
      section: z.string(),
      issueIndex: z.number(),
    })
  ),
  startedAt: z.string(),
  completedAt: z.string(),
});

// ============================================================================
// Run IDs
// ============================================================================

/**
 * Round a timestamp down to the start of its idempotency window
 */
export function roundTimestamp(timestamp: Date | string, windowMinutes: number): string {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  if (Number.isNaN(date.getTime())) {
    throw new ResearchError('CONFIG_INVALID', `Invalid timestamp: ${String(timestamp)}`);
  }
  const intervalMs = windowMinutes * 60 * 1000;
  return new Date(Math.floor(date.getTime() / intervalMs) * intervalMs).toISOString();
}

/**
 * Deterministic run ID: the same target inside the same window gets the same ID
 */
export function generateRunId(target: Pick<ResearchTarget, 'key'>, startedAt: Date | string, windowMinutes: number): RunId {
  const hashInput = [target.key, roundTimestamp(startedAt, windowMinutes)].join('|');
  const hash = createHash('sha256').update(hashInput).digest('hex');
  return `run_${hash.substring(0, 16)}`;
}

// ============================================================================
// Artifact I/O
// ============================================================================

function meta(runId: RunId, timestamp: string, startTime: number): ModuleResult['metadata'] {
  return { runId, module: 'run-manager', timestamp, duration: Date.now() - startTime };
}

function failure<T>(code: string, message: string, runId: RunId, timestamp: string, startTime: number, error: unknown): ModuleResult<T> {
  const detail = error instanceof Error ? error.message : 'Unknown error';
  return {
    success: false,
    error: { code, message: `${message}: ${detail}`, details: { error } },
    metadata: meta(runId, timestamp, startTime),
  };
}

function parseJson(content: string | Buffer, what: string): unknown {
  try {
    return JSON.parse(content.toString());
  } catch (error) {
    throw new ResearchError('ARTIFACT_INVALID', `Stored ${what} is not valid JSON`, { cause: error });
  }
}

export async function loadRunArtifact(runId: RunId, storage: StorageAdapter): Promise<RunArtifact> {
  const { content } = await storage.load(runId, 'run_artifact');
  const result = RunArtifactSchema.safeParse(parseJson(content, 'run artifact'));
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ResearchError('ARTIFACT_INVALID', `Stored run artifact is invalid: ${errors.join('; ')}`, { details: errors });
  }
  return result.data;
}

async function saveRunArtifact(artifact: RunArtifact, storage: StorageAdapter): Promise<void> {
  await storage.save(artifact.run_id, 'run_artifact', JSON.stringify(artifact, null, 2), {
    contentType: 'application/json',
  });
}

function toMetadata(artifact: RunArtifact, reused: boolean): RunMetadata {
  const metadata: RunMetadata = {
    runId: artifact.run_id,
    createdAt: artifact.created_at,
    status: artifact.status,
    artifacts: Object.entries(artifact.artifacts)
      .filter(([, stored]) => stored)
      .map(([type]) => type),
    reused,
  };
  if (artifact.errors.length > 0) {
    metadata.error = artifact.errors.join('; ');
  }
  return metadata;
}

function isFinished(status: RunArtifactStatus): boolean {
  return status === 'completed' || status === 'partial';
}

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * Look up an existing run artifact
 */
export async function checkIdempotency(
  runId: RunId,
  storage: StorageAdapter
): Promise<ModuleResult<{ exists: boolean; runArtifact?: RunArtifact }>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    if (!(await storage.exists(runId, 'run_artifact'))) {
      return { success: true, data: { exists: false }, metadata: meta(runId, timestamp, startTime) };
    }
    const runArtifact = await loadRunArtifact(runId, storage);
    return { success: true, data: { exists: true, runArtifact }, metadata: meta(runId, timestamp, startTime) };
  } catch (error) {
    return failure('IDEMPOTENCY_CHECK_ERROR', 'Failed to check idempotency', runId, timestamp, startTime, error);
  }
}

/**
 * Start a run, or return the finished run already stored under the same ID.
 * Unfinished or failed runs are started over.
 */
export async function createRun(
  runId: RunId,
  target: ResearchTarget,
  storage: StorageAdapter
): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const idempotency = await checkIdempotency(runId, storage);
  if (!idempotency.success || !idempotency.data) {
    return {
      success: false,
      error: idempotency.error ?? { code: 'IDEMPOTENCY_CHECK_ERROR', message: 'Idempotency check failed' },
      metadata: meta(runId, timestamp, startTime),
    };
  }

  const existing = idempotency.data.runArtifact;
  if (existing && isFinished(existing.status)) {
    return { success: true, data: toMetadata(existing, true), metadata: meta(runId, timestamp, startTime) };
  }

  try {
    const artifact: RunArtifact = {
      run_id: runId,
      status: 'running',
      created_at: timestamp,
      completed_at: null,
      target_key: target.key,
      schema_version: null,
      artifacts: { target: true, record: false, run_artifact: true, outreach: false },
      consumers: {},
      quality_overall: null,
      errors: existing ? [`restarted after status ${existing.status}`] : [],
    };

    await storage.save(runId, 'target', JSON.stringify(target, null, 2), { contentType: 'application/json' });
    await saveRunArtifact(artifact, storage);

    return { success: true, data: toMetadata(artifact, false), metadata: meta(runId, timestamp, startTime) };
  } catch (error) {
    return failure('RUN_CREATION_ERROR', 'Failed to create run', runId, timestamp, startTime, error);
  }
}

/**
 * Update the run's status; terminal statuses set `completed_at`
 */
export async function updateRunStatus(
  runId: RunId,
  status: RunArtifactStatus,
  storage: StorageAdapter,
  details: { error?: string; qualityOverall?: number; schemaVersion?: string } = {}
): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const current = await loadRunArtifact(runId, storage);
    const updated: RunArtifact = {
      ...current,
      status,
      completed_at: isFinished(status) || status === 'failed' ? timestamp : current.completed_at,
      quality_overall: details.qualityOverall ?? current.quality_overall,
      schema_version: details.schemaVersion ?? current.schema_version,
      errors: details.error ? [...current.errors, details.error] : current.errors,
    };
    await saveRunArtifact(updated, storage);
    return { success: true, data: toMetadata(updated, false), metadata: meta(runId, timestamp, startTime) };
  } catch (error) {
    return failure('STATUS_UPDATE_ERROR', 'Failed to update run status', runId, timestamp, startTime, error);
  }
}

export async function markArtifactComplete(
  runId: RunId,
  artifactType: ArtifactType,
  storage: StorageAdapter
): Promise<ModuleResult<void>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const current = await loadRunArtifact(runId, storage);
    await saveRunArtifact({ ...current, artifacts: { ...current.artifacts, [artifactType]: true } }, storage);
    return { success: true, metadata: meta(runId, timestamp, startTime) };
  } catch (error) {
    return failure('ARTIFACT_UPDATE_ERROR', 'Failed to mark artifact complete', runId, timestamp, startTime, error);
  }
}

/**
 * Record the outcome of one downstream consumer
 */
export async function recordConsumerResult(
  runId: RunId,
  consumer: string,
  outcome: { success: boolean; error?: string },
  storage: StorageAdapter
): Promise<ModuleResult<void>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const current = await loadRunArtifact(runId, storage);
    const result: ConsumerResult = {
      status: outcome.success ? 'success' : 'failed',
      attempted_at: timestamp,
      error: outcome.error ?? null,
    };
    await saveRunArtifact({ ...current, consumers: { ...current.consumers, [consumer]: result } }, storage);
    return { success: true, metadata: meta(runId, timestamp, startTime) };
  } catch (error) {
    return failure('CONSUMER_UPDATE_ERROR', 'Failed to record consumer result', runId, timestamp, startTime, error);
  }
}

// ============================================================================
// Research Records
// ============================================================================

export async function saveResearchRecord(record: ResearchRecord, storage: StorageAdapter): Promise<void> {
  await storage.save(record.runId, 'record', JSON.stringify(record, null, 2), { contentType: 'application/json' });
}

/**
 * Load and validate a stored research record
 *
 * @throws ResearchError (ARTIFACT_NOT_FOUND, ARTIFACT_INVALID)
 */
export async function loadResearchRecord(runId: RunId, storage: StorageAdapter): Promise<ResearchRecord> {
  const { content } = await storage.load(runId, 'record');
  const result = ResearchRecordSchema.safeParse(parseJson(content, 'research record'));
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ResearchError('ARTIFACT_INVALID', `Stored research record is invalid: ${errors.join('; ')}`, {
      details: errors,
    });
  }
  return result.data;
}

export default {
  generateRunId,
  roundTimestamp,
  checkIdempotency,
  createRun,
  updateRunStatus,
  markArtifactComplete,
  recordConsumerResult,
  saveResearchRecord,
  loadResearchRecord,
  loadRunArtifact,
};

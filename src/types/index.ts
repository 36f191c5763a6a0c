/**
 * Core type definitions for the company research pipeline
 *
 * Shared data model used by every module. Component-specific contracts
 * (retrieval sources, extraction capabilities, ad data sources) live next
 * to the component that consumes them.
 */

/**
 * Unique identifier for a research run
 * Format: run_<16 hex chars of sha256>
 */
export type RunId = string;

/**
 * JSON-compatible value produced by extraction and stored in a profile
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// Research Target
// ============================================================================

/**
 * Canonical research target. Frozen at run start; replaced, never mutated.
 */
export interface ResearchTarget {
  /** Canonical company key: bare domain, or normalized name when no URL is known */
  readonly key: string;
  readonly url: string | null;
  readonly domain: string | null;
  readonly displayName: string;
  readonly notes: string | null;
}

// ============================================================================
// Queries and Retrieved Content
// ============================================================================

export type QueryOrigin = 'seed' | 'gap-fill';

/**
 * A single retrieval request
 */
export interface Query {
  readonly id: string;
  readonly text: string;
  /** Dedup key; two queries with equal normalized text are the same query */
  readonly normalizedText: string;
  readonly origin: QueryOrigin;
  readonly round: number;
  /** Schema section the query targets */
  readonly section: string;
  /** Position in the run-wide issue order; drives deterministic merge order */
  readonly issueIndex: number;
}

/**
 * Raw content item returned by a retrieval source
 */
export interface ContentItem {
  readonly queryId: string;
  readonly sourceUrl: string;
  readonly title: string | null;
  readonly text: string;
  readonly retrievedAt: string;
}

// ============================================================================
// Profile and Fragments
// ============================================================================

export type SectionValues = Readonly<Record<string, JsonValue>>;

/**
 * Structured, schema-conforming description of a research target.
 * Only populated (non-placeholder) values are stored.
 */
export type Profile = Readonly<Record<string, SectionValues>>;

/**
 * Field rejected during extraction validation
 */
export interface FieldIssue {
  readonly path: string;
  readonly reason: 'unknown_section' | 'unknown_field' | 'shape_mismatch';
  readonly message: string;
}

/**
 * Partial profile returned by one extraction call
 */
export interface ProfileFragment {
  readonly id: string;
  readonly round: number;
  readonly values: Profile;
  /** `section.field` paths the extraction explicitly marks as corrections */
  readonly corrections: readonly string[];
  /** Declared `section.field` paths the extraction could not populate */
  readonly unpopulated: readonly string[];
  readonly dropped: readonly FieldIssue[];
  readonly degraded: boolean;
  readonly degradedReason: string | null;
  readonly sourceQueryIds: readonly string[];
}

// ============================================================================
// Advertising Intelligence
// ============================================================================

export type AdIntelligenceMode = 'live' | 'fallback';

export type FallbackReason =
  | 'disabled'
  | 'no_credential'
  | 'CREDENTIAL_INVALID'
  | 'RATE_LIMITED'
  | 'UNAVAILABLE'
  | 'TIMEOUT'
  | 'ENRICHMENT_UNAVAILABLE';

export type AdvertisingStatus =
  | 'active_advertiser'
  | 'inactive_advertiser'
  | 'no_ads_found'
  | 'unavailable';

export type SophisticationLevel = 'none' | 'low' | 'medium' | 'high' | 'unknown';

export type TargetingBreadth = 'none' | 'narrow' | 'moderate' | 'broad' | 'unknown';

export interface AdCounts {
  readonly activeAds: number;
  readonly totalAds: number;
  readonly platformDistribution: Readonly<Record<string, number>>;
}

export interface AdSignals {
  readonly creativeFormats: Readonly<Record<string, number>>;
  /** Groups of concurrent ads sharing a headline with different copy */
  readonly abTestGroups: number;
  readonly themes: readonly string[];
  readonly latestActivity: string | null;
}

export interface AdNarrative {
  readonly advertisingStatus: AdvertisingStatus;
  readonly sophistication: SophisticationLevel;
  readonly targetingBreadth: TargetingBreadth;
  readonly activeCampaignsSummary: string;
  readonly optimizationOpportunities: readonly string[];
}

/**
 * Advertising-intelligence result. Attached once per run, immutable.
 */
export interface AdIntelligenceResult {
  readonly mode: AdIntelligenceMode;
  readonly fallbackReason: FallbackReason | null;
  readonly counts: AdCounts;
  readonly signals: AdSignals;
  readonly summary: AdNarrative;
  readonly producedAt: string;
}

// ============================================================================
// Quality Score
// ============================================================================

export interface SectionScore {
  readonly section: string;
  readonly label: string;
  readonly weight: number;
  /** Populated fields / declared fields */
  readonly coverage: number;
  /** Coverage blended with advertising confidence where the section declares it */
  readonly score: number;
  readonly populated: number;
  readonly total: number;
}

export interface QualityScore {
  readonly overall: number;
  readonly sections: readonly SectionScore[];
  readonly computedAt: string;
}

// ============================================================================
// Run State
// ============================================================================

export type RunStatus = 'pending' | 'completed' | 'partial' | 'failed';

export type OrchestratorState =
  | 'INIT'
  | 'PLANNING'
  | 'RETRIEVING'
  | 'EXTRACTING'
  | 'REFLECTING'
  | 'ENRICHING'
  | 'SCORING'
  | 'DONE'
  | 'FAILED';

/**
 * Per-round bookkeeping recorded by the orchestrator
 */
export interface RoundRecord {
  readonly round: number;
  readonly queryIds: readonly string[];
  readonly itemsRetrieved: number;
  readonly failedQueryIds: readonly string[];
  readonly fragmentId: string | null;
  readonly degraded: boolean;
  readonly degradedReasons: readonly string[];
  readonly gapsAfter: readonly string[];
  readonly budgetExhausted: boolean;
}

/**
 * The run's evolving state. Owned and replaced only by the orchestrator.
 */
export interface RunState {
  readonly runId: RunId;
  readonly target: ResearchTarget;
  readonly schemaVersion: string;
  readonly status: RunStatus;
  readonly phase: OrchestratorState;
  readonly round: number;
  readonly profile: Profile;
  readonly issuedQueries: readonly Query[];
  readonly unresolvableSections: readonly string[];
  readonly rounds: readonly RoundRecord[];
  readonly extractedBatchIds: readonly string[];
  readonly adIntelligence: AdIntelligenceResult | null;
  readonly quality: QualityScore | null;
  readonly timedOutStates: readonly OrchestratorState[];
  readonly errors: readonly string[];
  readonly startedAt: string;
  readonly completedAt: string | null;
}

// ============================================================================
// External Interfaces
// ============================================================================

/**
 * Progress event delivered to the observer. Delivery is at-least-once;
 * consumers deduplicate by `sequence`.
 */
export interface ProgressEvent {
  readonly sequence: number;
  readonly runId: RunId;
  readonly state: OrchestratorState;
  readonly round: number;
  readonly timestamp: string;
}

export interface ProgressObserver {
  onProgress(event: ProgressEvent): void | Promise<void>;
}

/**
 * Immutable hand-off record for downstream consumers
 */
export interface ResearchRecord {
  readonly runId: RunId;
  readonly schemaVersion: string;
  readonly target: ResearchTarget;
  readonly status: Exclude<RunStatus, 'pending' | 'failed'>;
  readonly profile: Profile;
  readonly adIntelligence: AdIntelligenceResult;
  readonly quality: QualityScore;
  readonly rounds: readonly RoundRecord[];
  readonly issuedQueries: readonly Query[];
  readonly startedAt: string;
  readonly completedAt: string;
}

/**
 * Downstream consumer (message generation, export). Receives the finished
 * record and has no further interaction with the orchestrator.
 */
export interface DownstreamConsumer {
  readonly name: string;
  consume(record: ResearchRecord): Promise<void>;
}

// ============================================================================
// Module Results and Storage
// ============================================================================

/**
 * Result wrapper returned by module entry points at system boundaries
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    runId: RunId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}

export type ArtifactType = 'target' | 'record' | 'run_artifact' | 'outreach';

/**
 * Artifact metadata for storage tracking
 */
export interface ArtifactMetadata {
  runId: RunId;
  artifactType: ArtifactType | string;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for artifact persistence
 */
export interface StorageAdapter {
  save(runId: RunId, artifactType: string, content: string | Buffer, metadata?: Record<string, unknown>): Promise<ArtifactMetadata>;
  load(runId: RunId, artifactType: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(runId: RunId, artifactType: string): Promise<boolean>;
  list(runId: RunId): Promise<ArtifactMetadata[]>;
  delete(runId: RunId, artifactType?: string): Promise<void>;
}

/**
 * Company Research Pipeline - Main Entry Point
 *
 * Gathers web content and advertising signals about a company, reconciles
 * them into a schema-conforming profile over a bounded number of rounds,
 * scores the result and hands it to downstream consumers.
 *
 * Architecture:
 * - The orchestrator owns run state and sequences every other component
 * - Components are pure over their inputs or call external sources
 *   through a per-source rate limit and retry policy
 * - Runs and their artifacts are stored under a deterministic RunID
 */

// Core Types
export type * from './types/index.js';

// Pipeline Entry
export {
  researchCompany,
  researchCompanies,
  type BatchOptions,
  type PipelineOptions,
  type PipelineOutcome,
  type ConsumerOutcome,
} from './pipeline/index.js';

// Orchestrator
export {
  ResearchOrchestrator,
  runResearch,
  type OrchestratorConfig,
  type OrchestratorDeps,
} from './orchestrator/index.js';

// Configuration
export {
  loadConfig,
  stateTimeout,
  DEFAULT_CONFIG,
  type PipelineConfig,
  type ConfigOverrides,
  type RateLimitSettings,
  type RetrySettings,
  type SophisticationPolicy,
  type SenderSettings,
  type SourceName,
  type TimedState,
} from './config/index.js';

// Errors
export {
  ResearchError,
  RetryExhaustedError,
  RunFailedError,
  classifyError,
  isResearchError,
  RESEARCH_ERROR_CODES,
  type ResearchErrorCode,
} from './errors/index.js';

// Observability
export {
  createLogger,
  silentLogger,
  noopMetrics,
  type Logger,
  type Metrics,
} from './observability/index.js';

// Normalizer
export {
  normalizeTarget,
  normalizeQueryText,
  deriveTargetKey,
  extractDomain,
  normalizeUrl,
  type RawTargetInput,
} from './normalizer/index.js';

// Rate Limiter / Retry
export {
  RateLimiter,
  ExternalCallPolicy,
  executeWithRetry,
  computeBackoff,
  createCallPolicies,
  type CallPolicies,
  type TimingDeps,
} from './rate-limiter/index.js';

// Schema and Profile
export {
  parseSchema,
  defineSchema,
  loadDefaultSchema,
  describeSchema,
  checkShape,
  type FieldShape,
  type ProfileSchema,
  type SectionDefinition,
  type SchemaDescription,
} from './schema/index.js';

export {
  mergeFragment,
  mergeFragments,
  combineFragments,
  sectionCoverage,
  isPopulatedValue,
} from './profile/index.js';

// Retriever
export {
  retrieveContent,
  FirecrawlRetrievalSource,
  createRetrievalSource,
  type RetrievalSource,
  type RetrievalBatch,
} from './retriever/index.js';

// Extractor
export {
  validateExtraction,
  extractFragment,
  ClaudeExtractionCapability,
  type ExtractionCapability,
  type ExtractionRequest,
} from './extractor/index.js';

// Planner
export {
  analyzeGaps,
  planQueries,
  type Gap,
  type QueryPlan,
} from './planner/index.js';

// Advertising Enrichment
export {
  enrichAdvertising,
  summarizeAdActivity,
  createFallbackResult,
  MetaAdLibrarySource,
  NullAdDataSource,
  getAdDataSource,
  type AdDataSource,
  type RawAdData,
} from './enrichment/index.js';

// Scoring
export { computeQualityScore } from './scoring/index.js';

// LLM
export {
  ClaudeClient,
  type LanguageModel,
} from './llm/index.js';

// Storage and Run Manager
export {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  type S3Config,
} from './storage/index.js';

export {
  generateRunId,
  roundTimestamp,
  createRun,
  checkIdempotency,
  updateRunStatus,
  markArtifactComplete,
  recordConsumerResult,
  saveResearchRecord,
  loadResearchRecord,
  type RunArtifact,
  type RunMetadata,
} from './run-manager/index.js';

// Outreach
export {
  OutreachDrafter,
  parseOutreachResponse,
  formatEmail,
  type OutreachEmail,
} from './outreach/index.js';

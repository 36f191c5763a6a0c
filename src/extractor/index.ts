/**
 * Schema-Constrained Extractor Module
 *
 * Turns a retrieved batch plus the current profile into a ProfileFragment
 * validated against the profile schema.
 *
 * Key behaviors:
 * - Fields violating their declared shape are dropped, never fatal
 * - Unknown sections and fields are dropped
 * - Parse errors are retried up to `maxRetries`; exhaustion, or an
 *   unavailable capability, yields an empty fragment marked degraded
 */

import { classifyError, ResearchError } from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, noopMetrics } from '../observability/index.js';
import type { ExternalCallPolicy } from '../rate-limiter/index.js';
import { raceAbort } from '../rate-limiter/index.js';
import { checkShape, describeSchema, declaredPaths, type ProfileSchema, type SchemaDescription } from '../schema/index.js';
import { deepFreeze, isPopulatedValue } from '../profile/index.js';
import type { LanguageModel } from '../llm/index.js';
import { loadPromptTemplate, parseJsonObject, renderTemplate } from '../llm/index.js';
import type { RetrievalBatch } from '../retriever/index.js';
import type {
  ContentItem,
  FieldIssue,
  JsonValue,
  Profile,
  ProfileFragment,
  ResearchTarget,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What an extraction capability receives
 */
export interface ExtractionRequest {
  target: ResearchTarget;
  items: readonly ContentItem[];
  schema: SchemaDescription;
  priorProfile: Profile;
  round: number;
}

/**
 * Extraction capability. Returns raw structured data shaped as
 * `{ [section]: { [field]: value }, _corrections?: ["section.field"] }`,
 * or throws a ResearchError with code EXTRACTION_PARSE_ERROR.
 */
export interface ExtractionCapability {
  readonly name: string;
  extract(request: ExtractionRequest, signal?: AbortSignal): Promise<unknown>;
}

/**
 * Read-only view of run state the extractor works from
 */
export interface ExtractionSnapshot {
  target: ResearchTarget;
  profile: Profile;
  round: number;
}

export interface ExtractOptions {
  policy: ExternalCallPolicy;
  /** Additional attempts after a parse error */
  maxRetries: number;
  signal?: AbortSignal;
  logger?: Logger;
  metrics?: Metrics;
}

export interface ValidatedExtraction {
  values: Profile;
  corrections: string[];
  unpopulated: string[];
  dropped: FieldIssue[];
}

export const CORRECTIONS_KEY = '_corrections';

// ============================================================================
// Validation
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate raw extraction output against the schema. Pure and deterministic:
 * identical input yields identical accept/reject decisions.
 */
export function validateExtraction(raw: unknown, schema: ProfileSchema): ValidatedExtraction {
  const dropped: FieldIssue[] = [];
  const values: Record<string, Record<string, JsonValue>> = {};

  if (!isPlainObject(raw)) {
    return {
      values: deepFreeze({}),
      corrections: [],
      unpopulated: declaredPaths(schema),
      dropped: [{ path: '$', reason: 'shape_mismatch', message: 'extraction result is not an object' }],
    };
  }

  const knownSections = new Set(schema.sections.map((section) => section.key));
  for (const [key, value] of Object.entries(raw)) {
    if (key === CORRECTIONS_KEY) {
      continue;
    }
    if (!knownSections.has(key)) {
      dropped.push({ path: key, reason: 'unknown_section', message: `section "${key}" is not declared` });
      continue;
    }
    if (value !== null && value !== undefined && !isPlainObject(value)) {
      dropped.push({ path: key, reason: 'shape_mismatch', message: 'section value must be an object' });
    }
  }

  const unpopulated: string[] = [];
  for (const section of schema.sections) {
    const rawSection = raw[section.key];
    const sectionValues = isPlainObject(rawSection) ? rawSection : {};

    for (const fieldKey of Object.keys(sectionValues)) {
      if (!(fieldKey in section.fields)) {
        dropped.push({
          path: `${section.key}.${fieldKey}`,
          reason: 'unknown_field',
          message: `field "${fieldKey}" is not declared in section "${section.key}"`,
        });
      }
    }

    for (const [fieldKey, shape] of Object.entries(section.fields)) {
      const path = `${section.key}.${fieldKey}`;
      const value = sectionValues[fieldKey];
      if (value === undefined || value === null) {
        unpopulated.push(path);
        continue;
      }

      const check = checkShape(shape, value);
      if (!check.ok) {
        dropped.push({ path, reason: 'shape_mismatch', message: check.message });
        unpopulated.push(path);
        continue;
      }
      if (!isPopulatedValue(check.value)) {
        unpopulated.push(path);
        continue;
      }
      values[section.key] = { ...(values[section.key] ?? {}), [fieldKey]: check.value };
    }
  }

  const rawCorrections = raw[CORRECTIONS_KEY];
  const corrections = Array.isArray(rawCorrections)
    ? [...new Set(rawCorrections.filter((path): path is string => typeof path === 'string'))].filter((path) => {
        const [sectionKey, fieldKey] = path.split('.');
        return sectionKey !== undefined && fieldKey !== undefined && values[sectionKey]?.[fieldKey] !== undefined;
      })
    : [];

  return deepFreeze({ values, corrections, unpopulated, dropped });
}

// ============================================================================
// Extraction
// ============================================================================

function degradedFragment(
  batch: RetrievalBatch,
  schema: ProfileSchema,
  reason: string
): ProfileFragment {
  return deepFreeze({
    id: `${batch.id}:fragment`,
    round: batch.round,
    values: {},
    corrections: [],
    unpopulated: declaredPaths(schema),
    dropped: [],
    degraded: true,
    degradedReason: reason,
    sourceQueryIds: [...batch.queryIds],
  });
}

/**
 * Extract a validated fragment from one batch. Never throws: every failure
 * becomes a degraded empty fragment carrying the reason.
 */
export async function extractFragment(
  batch: RetrievalBatch,
  snapshot: ExtractionSnapshot,
  schema: ProfileSchema,
  capability: ExtractionCapability,
  options: ExtractOptions
): Promise<ProfileFragment> {
  const logger = options.logger ?? createLogger('extractor');
  const metrics = options.metrics ?? noopMetrics;
  const startTime = Date.now();

  if (batch.items.length === 0) {
    logger.info('Batch has no content, skipping extraction', { batchId: batch.id });
    return deepFreeze({
      id: `${batch.id}:fragment`,
      round: batch.round,
      values: {},
      corrections: [],
      unpopulated: declaredPaths(schema),
      dropped: [],
      degraded: false,
      degradedReason: null,
      sourceQueryIds: [...batch.queryIds],
    });
  }

  const request: ExtractionRequest = {
    target: snapshot.target,
    items: batch.items,
    schema: describeSchema(schema),
    priorProfile: snapshot.profile,
    round: snapshot.round,
  };

  const maxAttempts = options.maxRetries + 1;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const raw = await raceAbort(
        options.policy.run('extract', (signal) => capability.extract(request, signal), options.signal),
        options.signal,
        'extraction'
      );
      if (!isPlainObject(raw)) {
        throw new ResearchError('EXTRACTION_PARSE_ERROR', 'Extraction result is not a JSON object');
      }

      const validated = validateExtraction(raw, schema);
      if (validated.dropped.length > 0) {
        logger.warn('Dropped invalid extraction fields', { batchId: batch.id, dropped: validated.dropped });
        metrics.increment('extractor.fields.dropped', { capability: capability.name });
      }
      metrics.timing('extractor.duration', Date.now() - startTime, { capability: capability.name });

      return deepFreeze({
        id: `${batch.id}:fragment`,
        round: batch.round,
        values: validated.values,
        corrections: validated.corrections,
        unpopulated: validated.unpopulated,
        dropped: validated.dropped,
        degraded: false,
        degradedReason: null,
        sourceQueryIds: [...batch.queryIds],
      });
    } catch (error) {
      const classified = classifyError(error, 'extraction');

      if (classified.code === 'EXTRACTION_PARSE_ERROR' && attempt < maxAttempts) {
        logger.warn(`Extraction parse error, retrying (attempt ${attempt + 1}/${maxAttempts})`, {
          batchId: batch.id,
          error: classified.message,
        });
        metrics.increment('extractor.parse_retry', { capability: capability.name });
        continue;
      }

      logger.error('Extraction failed, returning degraded fragment', {
        batchId: batch.id,
        code: classified.code,
        attempts: attempt,
        error: classified.message,
      });
      metrics.increment('extractor.degraded', { capability: capability.name, code: classified.code });
      return degradedFragment(batch, schema, classified.code);
    }
  }

  return degradedFragment(batch, schema, 'EXTRACTION_PARSE_ERROR');
}

// ============================================================================
// Claude Capability
// ============================================================================

export const EXTRACTION_PROMPT_FILE = 'extract-profile.md';

/**
 * Extraction capability backed by a language model and the
 * `prompts/extract-profile.md` template
 */
export class ClaudeExtractionCapability implements ExtractionCapability {
  readonly name = 'claude';

  constructor(
    private readonly model: LanguageModel,
    private readonly settings: { maxItemChars: number; promptsDir?: string }
  ) {}

  async extract(request: ExtractionRequest, signal?: AbortSignal): Promise<unknown> {
    const template = await loadPromptTemplate(EXTRACTION_PROMPT_FILE, this.settings.promptsDir);
    const sources = request.items.map((item, index) => {
      const text = item.text.length > this.settings.maxItemChars ? item.text.slice(0, this.settings.maxItemChars) : item.text;
      return `### Source ${index + 1}: ${item.title ?? item.sourceUrl}\nURL: ${item.sourceUrl}\n\n${text}`;
    });

    const prompt = renderTemplate(template, {
      company_name: request.target.displayName,
      company_url: request.target.url ?? 'unknown',
      round: String(request.round),
      schema: JSON.stringify(request.schema, null, 2),
      prior_profile: JSON.stringify(request.priorProfile, null, 2),
      sources: sources.join('\n\n---\n\n'),
      corrections_key: CORRECTIONS_KEY,
    });

    const text = await this.model.complete(prompt, { signal });
    return parseJsonObject(text, 'EXTRACTION_PARSE_ERROR');
  }
}

export default {
  validateExtraction,
  extractFragment,
  ClaudeExtractionCapability,
};

/**
 * Errors Module
 *
 * Typed error taxonomy for the research pipeline plus classification of
 * HTTP and SDK failures into retryable and terminal categories.
 */

import axios from 'axios';
import type { RunState } from '../types/index.js';

// ============================================================================
// Error Codes
// ============================================================================

export const RESEARCH_ERROR_CODES = [
  'RETRIEVAL_FAILED',
  'BATCH_EMPTY',
  'EXTRACTION_PARSE_ERROR',
  'CREDENTIAL_INVALID',
  'ENRICHMENT_UNAVAILABLE',
  'RATE_LIMITED',
  'UNAVAILABLE',
  'TIMEOUT',
  'CANCELLED',
  'MALFORMED_REQUEST',
  'RUN_FAILED',
  'CONFIG_INVALID',
  'ARTIFACT_NOT_FOUND',
  'ARTIFACT_INVALID',
  'DRAFT_PARSE_ERROR',
] as const;

export type ResearchErrorCode = (typeof RESEARCH_ERROR_CODES)[number];

/** Codes the retry policy may retry */
const RETRYABLE_CODES: ReadonlySet<ResearchErrorCode> = new Set<ResearchErrorCode>([
  'RATE_LIMITED',
  'UNAVAILABLE',
  'TIMEOUT',
]);

export interface ResearchErrorOptions {
  retryable?: boolean;
  details?: unknown;
  cause?: unknown;
  /** Server-provided wait hint, e.g. from a Retry-After header */
  retryAfterMs?: number;
}

// ============================================================================
// Error Classes
// ============================================================================

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;
  readonly retryable: boolean;
  readonly details?: unknown;
  readonly retryAfterMs?: number;

  constructor(code: ResearchErrorCode, message: string, options: ResearchErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResearchError';
    this.code = code;
    this.retryable = options.retryable ?? RETRYABLE_CODES.has(code);
    this.details = options.details;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Raised by the retry policy once every attempt has failed with a retryable error
 */
export class RetryExhaustedError extends ResearchError {
  readonly attempts: number;
  readonly lastCode: ResearchErrorCode;

  constructor(lastError: ResearchError, attempts: number) {
    super(lastError.code, `Retries exhausted after ${attempts} attempts: ${lastError.message}`, {
      retryable: false,
      details: lastError.details,
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastCode = lastError.code;
  }
}

/**
 * Fatal run failure. Carries the last-known run state for diagnostics.
 */
export class RunFailedError extends ResearchError {
  readonly lastState: RunState;

  constructor(message: string, lastState: RunState) {
    super('RUN_FAILED', message, { retryable: false, details: { runId: lastState.runId } });
    this.name = 'RunFailedError';
    this.lastState = lastState;
  }
}

export function isResearchError(error: unknown): error is ResearchError {
  return error instanceof ResearchError;
}

// ============================================================================
// Classification
// ============================================================================

/** Graph API error codes signalling throttling */
const GRAPH_THROTTLE_CODES = new Set([4, 17, 32, 613]);
/** Graph API error codes signalling an expired or invalid token */
const GRAPH_AUTH_CODES = new Set([102, 190]);

function codeForStatus(status: number): ResearchErrorCode {
  if (status === 401 || status === 403) {
    return 'CREDENTIAL_INVALID';
  }
  if (status === 429) {
    return 'RATE_LIMITED';
  }
  if (status === 408) {
    return 'TIMEOUT';
  }
  if (status >= 500) {
    return 'UNAVAILABLE';
  }
  return 'MALFORMED_REQUEST';
}

function readGraphErrorCode(data: unknown): number | null {
  if (typeof data !== 'object' || data === null || !('error' in data)) {
    return null;
  }
  const inner = data.error;
  if (typeof inner !== 'object' || inner === null || !('code' in inner)) {
    return null;
  }
  return typeof inner.code === 'number' ? inner.code : null;
}

function readRetryAfter(headers: unknown): number | undefined {
  if (typeof headers !== 'object' || headers === null || !('retry-after' in headers)) {
    return undefined;
  }
  const value = Number(headers['retry-after']);
  return Number.isFinite(value) && value >= 0 ? value * 1000 : undefined;
}

function isAbortError(error: unknown): boolean {
  if (axios.isCancel(error)) {
    return true;
  }
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

/**
 * Map any thrown value from an external call onto the research taxonomy.
 * ResearchErrors pass through unchanged.
 */
export function classifyError(error: unknown, context = 'external call'): ResearchError {
  if (error instanceof ResearchError) {
    return error;
  }

  if (isAbortError(error)) {
    return new ResearchError('CANCELLED', `${context} cancelled`, { cause: error });
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ResearchError('TIMEOUT', `${context} timed out`, { cause: error });
    }

    const response = error.response;
    if (!response) {
      return new ResearchError('UNAVAILABLE', `${context} failed: ${error.message}`, { cause: error });
    }

    const graphCode = readGraphErrorCode(response.data);
    if (graphCode !== null && GRAPH_AUTH_CODES.has(graphCode)) {
      return new ResearchError('CREDENTIAL_INVALID', `${context} rejected credential (code ${graphCode})`, {
        cause: error,
        details: response.data,
      });
    }
    if (graphCode !== null && GRAPH_THROTTLE_CODES.has(graphCode)) {
      return new ResearchError('RATE_LIMITED', `${context} throttled (code ${graphCode})`, {
        cause: error,
        details: response.data,
      });
    }

    return new ResearchError(codeForStatus(response.status), `${context} failed with HTTP ${response.status}`, {
      cause: error,
      details: response.data,
      retryAfterMs: readRetryAfter(response.headers),
    });
  }

  // SDK errors (e.g. Anthropic APIError) expose a numeric status
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    const message = error instanceof Error ? error.message : String(error);
    return new ResearchError(codeForStatus(error.status), `${context} failed with status ${error.status}: ${message}`, {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  if (/timed? ?out/i.test(message)) {
    return new ResearchError('TIMEOUT', `${context} timed out: ${message}`, { cause: error });
  }
  return new ResearchError('UNAVAILABLE', `${context} failed: ${message}`, { cause: error });
}

export default {
  ResearchError,
  RetryExhaustedError,
  RunFailedError,
  classifyError,
  isResearchError,
};

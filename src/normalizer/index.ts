/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Accept a raw research request (URL and/or company name)
 * - Canonicalize it into a frozen ResearchTarget
 * - Derive the canonical company key used for run ids and dedup
 * - Normalize query text for run-wide query deduplication
 *
 * Usage:
 * const result = normalizeTarget({ url: 'www.example.com/' });
 */

import { z } from 'zod';
import type { ModuleResult, ResearchTarget } from '../types/index.js';

/**
 * Raw research request accepted from callers
 */
export interface RawTargetInput {
  url?: string | null;
  name?: string | null;
  notes?: string | null;
}

const RawTargetSchema = z.object({
  url: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
});

/**
 * Trim whitespace from string value, mapping blank strings to null
 */
function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Normalize URL by ensuring scheme presence and removing trailing slashes
 */
function normalizeUrl(url: string | null | undefined): string | null {
  const trimmed = trimString(url);
  if (!trimmed) {
    return null;
  }

  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  try {
    const urlObj = new URL(withScheme);
    urlObj.hash = '';
    if (urlObj.pathname !== '/' && urlObj.pathname.endsWith('/')) {
      urlObj.pathname = urlObj.pathname.replace(/\/+$/, '');
    }
    return urlObj.toString();
  } catch {
    return null;
  }
}

/**
 * Extract the bare host (no www.) from a URL
 */
function extractDomain(url: string | null | undefined): string | null {
  const normalizedUrl = normalizeUrl(url);
  if (!normalizedUrl) {
    return null;
  }

  const hostname = new URL(normalizedUrl).hostname.replace(/^www\./i, '').toLowerCase();
  return hostname.includes('.') ? hostname : null;
}

/**
 * Derive a readable company name from a domain: "acme-tools.de" -> "Acme Tools"
 */
function displayNameFromDomain(domain: string): string {
  const base = domain.split('.')[0] ?? domain;
  return base
    .split(/[-_]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

/**
 * Normalize free text for deduplication: NFKC, lower case, punctuation
 * other than "." and "-" removed, whitespace collapsed.
 */
export function normalizeQueryText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s.-]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Canonical company key: bare domain when known, otherwise the normalized name
 */
export function deriveTargetKey(domain: string | null, name: string | null): string | null {
  if (domain) {
    return domain;
  }
  if (name) {
    const key = normalizeQueryText(name).replace(/\s+/g, '_');
    return key.length > 0 ? key : null;
  }
  return null;
}

/**
 * Normalize raw input to a canonical, frozen ResearchTarget
 *
 * @param rawInput - Raw request from an API call or CLI
 * @returns ModuleResult containing the target or validation errors
 */
export function normalizeTarget(rawInput: unknown): ModuleResult<ResearchTarget> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = RawTargetSchema.safeParse(rawInput);

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Input validation failed',
        details: errors,
      },
      metadata: {
        runId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const raw = parseResult.data;
  const rawUrl = trimString(raw.url);
  const url = normalizeUrl(rawUrl);
  const domain = extractDomain(url);
  const name = trimString(raw.name);
  const key = deriveTargetKey(domain, name);

  if (rawUrl && !domain) {
    return {
      success: false,
      error: {
        code: 'INVALID_URL',
        message: `Could not derive a domain from URL: ${rawUrl}`,
        details: { url: rawUrl },
      },
      metadata: {
        runId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  if (!key) {
    return {
      success: false,
      error: {
        code: 'TARGET_REQUIRED',
        message: 'At least one of url or name must be present',
        details: { url: raw.url ?? null, name: raw.name ?? null },
      },
      metadata: {
        runId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const target: ResearchTarget = Object.freeze({
    key,
    url,
    domain,
    displayName: name ?? (domain ? displayNameFromDomain(domain) : key),
    notes: trimString(raw.notes),
  });

  return {
    success: true,
    data: target,
    metadata: {
      runId: '',
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

export { extractDomain, normalizeUrl, trimString, displayNameFromDomain };

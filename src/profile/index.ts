/**
 * Profile Module
 *
 * Placeholder detection, section coverage and the non-destructive merge
 * of extraction fragments into the run's profile.
 *
 * Merge rule: a field that already holds non-placeholder content keeps its
 * value unless the incoming fragment lists the field's path in
 * `corrections`. Merging is total, idempotent and associative (see
 * `combineFragments`).
 */

import type { JsonValue, Profile, ProfileFragment, SectionValues } from '../types/index.js';
import type { ProfileSchema, SectionDefinition } from '../schema/index.js';

// ============================================================================
// Freezing
// ============================================================================

/**
 * Recursively freeze a value and return it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ============================================================================
// Placeholder Detection
// ============================================================================

const PLACEHOLDER_STRINGS = new Set([
  '',
  '-',
  '--',
  '?',
  'n/a',
  'na',
  'none',
  'null',
  'undefined',
  'unknown',
  'not found',
  'not available',
  'not specified',
  'no data',
  'no information',
  'tbd',
]);

/**
 * True when a value carries real content. Null, blank strings, common
 * placeholders such as "Not found", and containers holding only such
 * values count as empty.
 */
export function isPopulatedValue(value: JsonValue | undefined): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'string') {
    return !PLACEHOLDER_STRINGS.has(value.trim().toLowerCase().replace(/[.!]+$/, ''));
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (typeof value === 'boolean') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.some((item) => isPopulatedValue(item));
  }
  return Object.values(value).some((item) => isPopulatedValue(item));
}

// ============================================================================
// Coverage
// ============================================================================

export interface SectionCoverage {
  section: string;
  populated: number;
  total: number;
  coverage: number;
  missingFields: string[];
}

export function sectionCoverage(profile: Profile, section: SectionDefinition): SectionCoverage {
  const values = profile[section.key] ?? {};
  const fields = Object.keys(section.fields);
  const missingFields = fields.filter((field) => !isPopulatedValue(values[field]));
  const populated = fields.length - missingFields.length;

  return {
    section: section.key,
    populated,
    total: fields.length,
    coverage: fields.length === 0 ? 0 : populated / fields.length,
    missingFields,
  };
}

export function profileCoverage(profile: Profile, schema: ProfileSchema): SectionCoverage[] {
  return schema.sections.map((section) => sectionCoverage(profile, section));
}

export function isProfileEmpty(profile: Profile): boolean {
  return Object.values(profile).every((section) => !Object.values(section).some((value) => isPopulatedValue(value)));
}

export function emptyProfile(): Profile {
  return Object.freeze({});
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Merge a fragment into a profile and return the new frozen profile.
 * The input profile is not modified.
 */
export function mergeFragment(profile: Profile, fragment: Pick<ProfileFragment, 'values' | 'corrections'>): Profile {
  const corrections = new Set(fragment.corrections);
  const next: Record<string, Record<string, JsonValue>> = {};

  for (const [sectionKey, section] of Object.entries(profile)) {
    next[sectionKey] = { ...section };
  }

  for (const [sectionKey, incoming] of Object.entries(fragment.values)) {
    for (const [fieldKey, value] of Object.entries(incoming)) {
      if (!isPopulatedValue(value)) {
        continue;
      }
      const target = next[sectionKey] ?? {};
      const existing = target[fieldKey];
      if (isPopulatedValue(existing) && !corrections.has(`${sectionKey}.${fieldKey}`)) {
        continue;
      }
      // Fragment values stay the caller's; only copies get frozen
      target[fieldKey] = structuredClone(value);
      next[sectionKey] = target;
    }
  }

  return deepFreeze(next);
}

/**
 * Merge fragments in order
 */
export function mergeFragments(
  profile: Profile,
  fragments: ReadonlyArray<Pick<ProfileFragment, 'values' | 'corrections'>>
): Profile {
  return fragments.reduce<Profile>((acc, fragment) => mergeFragment(acc, fragment), profile);
}

export interface CombinedFragment {
  values: Profile;
  corrections: string[];
}

/**
 * Combine two fragments so that merging the result equals merging `first`
 * then `second` into any profile.
 */
export function combineFragments(
  first: Pick<ProfileFragment, 'values' | 'corrections'>,
  second: Pick<ProfileFragment, 'values' | 'corrections'>
): CombinedFragment {
  const firstCorrections = new Set(first.corrections);
  const secondCorrections = new Set(second.corrections);
  const values: Record<string, Record<string, JsonValue>> = {};
  const corrections: string[] = [];

  const sectionKeys = new Set([...Object.keys(first.values), ...Object.keys(second.values)]);
  for (const sectionKey of sectionKeys) {
    const a: SectionValues = first.values[sectionKey] ?? {};
    const b: SectionValues = second.values[sectionKey] ?? {};
    const fieldKeys = new Set([...Object.keys(a), ...Object.keys(b)]);

    for (const fieldKey of fieldKeys) {
      const path = `${sectionKey}.${fieldKey}`;
      const aValue = a[fieldKey];
      const bValue = b[fieldKey];
      const aPopulated = isPopulatedValue(aValue);
      const bPopulated = isPopulatedValue(bValue);

      let chosen: JsonValue | undefined;
      let corrected = false;
      if (bPopulated && secondCorrections.has(path)) {
        chosen = bValue;
        corrected = true;
      } else if (aPopulated) {
        chosen = aValue;
        corrected = firstCorrections.has(path);
      } else if (bPopulated) {
        chosen = bValue;
      }

      if (chosen === undefined) {
        continue;
      }
      values[sectionKey] = { ...(values[sectionKey] ?? {}), [fieldKey]: structuredClone(chosen) };
      if (corrected) {
        corrections.push(path);
      }
    }
  }

  return deepFreeze({ values, corrections });
}

export default {
  deepFreeze,
  isPopulatedValue,
  sectionCoverage,
  profileCoverage,
  isProfileEmpty,
  mergeFragment,
  mergeFragments,
  combineFragments,
};

/**
 * Quality Scorer Module
 *
 * Weighted coverage over the profile schema. Pure: no I/O, and identical
 * input always yields the identical score.
 */

import { deepFreeze, sectionCoverage } from '../profile/index.js';
import type { ProfileSchema, SectionDefinition } from '../schema/index.js';
import type { AdIntelligenceResult, Profile, QualityScore, SectionScore } from '../types/index.js';

/**
 * Confidence contributed by the advertising result to sections that declare
 * an advertising signal: 1 when live, the section's fallback confidence when
 * the result is a fallback, 0 when there is no result yet.
 */
export function adConfidence(section: SectionDefinition, adIntelligence: AdIntelligenceResult | null): number {
  if (!section.advertisingSignal || !adIntelligence) {
    return 0;
  }
  return adIntelligence.mode === 'live' ? 1 : section.advertisingSignal.fallbackConfidence;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function scoreSection(
  profile: Profile,
  section: SectionDefinition,
  adIntelligence: AdIntelligenceResult | null
): SectionScore {
  const coverage = sectionCoverage(profile, section);
  const signal = section.advertisingSignal;
  const score = signal
    ? (1 - signal.weight) * coverage.coverage + signal.weight * adConfidence(section, adIntelligence)
    : coverage.coverage;

  return {
    section: section.key,
    label: section.label,
    weight: section.weight,
    coverage: round4(coverage.coverage),
    score: round4(score),
    populated: coverage.populated,
    total: coverage.total,
  };
}

/**
 * Compute the quality score of a profile
 */
export function computeQualityScore(
  profile: Profile,
  schema: ProfileSchema,
  adIntelligence: AdIntelligenceResult | null,
  now: Date = new Date()
): QualityScore {
  const sections = schema.sections.map((section) => scoreSection(profile, section, adIntelligence));
  const totalWeight = sections.reduce((sum, section) => sum + section.weight, 0);
  const weighted = sections.reduce((sum, section) => sum + section.weight * section.score, 0);

  return deepFreeze({
    overall: totalWeight === 0 ? 0 : round4(Math.min(1, Math.max(0, weighted / totalWeight))),
    sections,
    computedAt: now.toISOString(),
  });
}

export default {
  computeQualityScore,
  scoreSection,
  adConfidence,
};

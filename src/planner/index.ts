/**
 * Gap Analyzer / Query Planner Module
 *
 * Compares the profile against the schema's required sections and emits
 * targeted queries for what is missing or thin.
 *
 * - One query per gap per round, in schema order, capped at `maxQueries`
 * - A query whose normalized text was issued before is never re-emitted
 * - A gap with no fresh candidate left becomes unresolvable and is
 *   excluded from later rounds
 */

import { normalizeQueryText } from '../normalizer/index.js';
import { sectionCoverage } from '../profile/index.js';
import type { ProfileSchema, SectionDefinition } from '../schema/index.js';
import type { Profile, Query, ResearchTarget } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type GapKind = 'missing' | 'low';

export interface Gap {
  section: string;
  label: string;
  kind: GapKind;
  coverage: number;
  missingFields: string[];
}

export interface GapOptions {
  /** Sections never reported again (already unresolvable) */
  excluded?: Iterable<string>;
  /** Sections with coverage below this are reported as `low` */
  lowCoverageThreshold: number;
}

export interface PlanInput {
  target: ResearchTarget;
  profile: Profile;
  schema: ProfileSchema;
  round: number;
  /** Every query issued so far in the run */
  issued: readonly Query[];
  unresolvable: readonly string[];
  maxQueries: number;
  lowCoverageThreshold: number;
}

export interface QueryPlan {
  queries: Query[];
  gaps: Gap[];
  newlyUnresolvable: string[];
}

// ============================================================================
// Gap Analysis
// ============================================================================

export function analyzeGaps(profile: Profile, schema: ProfileSchema, options: GapOptions): Gap[] {
  const excluded = new Set(options.excluded ?? []);
  const gaps: Gap[] = [];

  for (const section of schema.sections) {
    if (!section.required || excluded.has(section.key)) {
      continue;
    }
    const coverage = sectionCoverage(profile, section);
    if (coverage.populated === 0) {
      gaps.push({ section: section.key, label: section.label, kind: 'missing', coverage: 0, missingFields: coverage.missingFields });
    } else if (coverage.coverage < options.lowCoverageThreshold) {
      gaps.push({
        section: section.key,
        label: section.label,
        kind: 'low',
        coverage: coverage.coverage,
        missingFields: coverage.missingFields,
      });
    }
  }

  return gaps;
}

// ============================================================================
// Query Synthesis
// ============================================================================

function humanize(fieldKey: string): string {
  return fieldKey.replace(/_/g, ' ');
}

/**
 * Candidate query texts for a gap, most specific first: each hint with the
 * company name, each hint with the domain, the section label with the name,
 * then the missing field names with the name.
 */
export function candidateQueries(target: ResearchTarget, section: SectionDefinition, gap?: Gap): string[] {
  const name = target.displayName;
  const candidates: string[] = [];

  for (const hint of section.queryHints) {
    candidates.push(`${name} ${hint}`);
  }
  if (target.domain) {
    for (const hint of section.queryHints) {
      candidates.push(`${target.domain} ${hint}`);
    }
  }
  candidates.push(`${name} ${section.label}`);
  for (const field of gap?.missingFields ?? []) {
    candidates.push(`${name} ${humanize(field)}`);
  }

  return candidates;
}

/**
 * Plan the next round's queries
 */
export function planQueries(input: PlanInput): QueryPlan {
  const gaps = analyzeGaps(input.profile, input.schema, {
    excluded: input.unresolvable,
    lowCoverageThreshold: input.lowCoverageThreshold,
  });

  const seen = new Set(input.issued.map((query) => query.normalizedText));
  const queries: Query[] = [];
  const newlyUnresolvable: string[] = [];
  let issueIndex = input.issued.reduce((max, query) => Math.max(max, query.issueIndex + 1), 0);

  for (const gap of gaps) {
    if (queries.length >= input.maxQueries) {
      break;
    }
    const section = input.schema.sections.find((candidate) => candidate.key === gap.section);
    if (!section) {
      continue;
    }

    const fresh = candidateQueries(input.target, section, gap).find((text) => {
      const normalized = normalizeQueryText(text);
      return normalized.length > 0 && !seen.has(normalized);
    });

    if (fresh === undefined) {
      newlyUnresolvable.push(gap.section);
      continue;
    }

    const normalizedText = normalizeQueryText(fresh);
    seen.add(normalizedText);
    const query: Query = {
      id: `q${issueIndex + 1}`,
      text: fresh,
      normalizedText,
      origin: input.round === 1 ? 'seed' : 'gap-fill',
      round: input.round,
      section: gap.section,
      issueIndex,
    };
    queries.push(Object.freeze(query));
    issueIndex += 1;
  }

  return { queries, gaps, newlyUnresolvable };
}

export default {
  analyzeGaps,
  candidateQueries,
  planQueries,
};

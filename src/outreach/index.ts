/**
 * Outreach Drafter Module
 *
 * Downstream consumer that turns a finished research record into a
 * personalized cold email and stores it as the run's `outreach` artifact.
 */

import { z } from 'zod';
import { ResearchError, classifyError } from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, noopMetrics } from '../observability/index.js';
import type { ExternalCallPolicy } from '../rate-limiter/index.js';
import type { SenderSettings } from '../config/index.js';
import type { LanguageModel } from '../llm/index.js';
import { loadPromptTemplate, parseJsonObject, renderTemplate } from '../llm/index.js';
import { markArtifactComplete } from '../run-manager/index.js';
import type { DownstreamConsumer, ResearchRecord, StorageAdapter } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface OutreachEmail {
  subjectLine: string;
  emailBody: string;
  keyInsightsUsed: string[];
  personalizationScore: number;
}

export interface OutreachDeps {
  policy: ExternalCallPolicy;
  storage?: StorageAdapter;
  promptsDir?: string;
  logger?: Logger;
  metrics?: Metrics;
}

export const OUTREACH_PROMPT_FILE = 'outreach-email.md';

const OUTREACH_SYSTEM_PROMPT =
  'You are an expert sales professional writing research-driven outreach. Output ONLY valid JSON, no markdown code fences.';

const OutreachResponseSchema = z.object({
  subject_line: z.string().trim().min(1),
  email_body: z.string().trim().min(1),
  key_insights_used: z.array(z.string()).default([]),
  personalization_score: z.coerce.number().int().min(1).max(10),
});

// ============================================================================
// Prompt
// ============================================================================

/** Sections scoring below this are flagged as thin in the prompt */
const THIN_SECTION_SCORE = 0.5;

/**
 * Company data handed to the model: the profile plus the advertising summary
 */
export function summarizeRecord(record: ResearchRecord): Record<string, unknown> {
  const ad = record.adIntelligence;
  return {
    company: record.target.displayName,
    profile: record.profile,
    advertising: {
      mode: ad.mode,
      status: ad.summary.advertisingStatus,
      sophistication: ad.summary.sophistication,
      targeting_breadth: ad.summary.targetingBreadth,
      active_campaigns: ad.summary.activeCampaignsSummary,
      optimization_opportunities: ad.summary.optimizationOpportunities,
      active_ads: ad.counts.activeAds,
      total_ads: ad.counts.totalAds,
      themes: ad.signals.themes,
    },
    thin_sections: record.quality.sections
      .filter((section) => section.score < THIN_SECTION_SCORE)
      .map((section) => section.label),
  };
}

export function buildOutreachPrompt(template: string, record: ResearchRecord, sender: SenderSettings): string {
  return renderTemplate(template, {
    company_name: record.target.displayName,
    company_url: record.target.url ?? record.target.key,
    company_data: JSON.stringify(summarizeRecord(record), null, 2),
    quality_overall: record.quality.overall.toFixed(2),
    sender_company: sender.company,
    sender_name: sender.name,
    sender_role: sender.role,
    service_offering: sender.offering,
    email_tone: sender.tone,
    email_length: sender.length,
    call_to_action: sender.callToAction,
    user_notes: record.target.notes ?? 'None',
  });
}

/**
 * Parse and validate the model's email JSON
 *
 * @throws ResearchError (DRAFT_PARSE_ERROR)
 */
export function parseOutreachResponse(text: string): OutreachEmail {
  const raw = parseJsonObject(text, 'DRAFT_PARSE_ERROR');
  const result = OutreachResponseSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ResearchError('DRAFT_PARSE_ERROR', `Invalid outreach response: ${errors.join('; ')}`, { details: errors });
  }
  return {
    subjectLine: result.data.subject_line,
    emailBody: result.data.email_body,
    keyInsightsUsed: result.data.key_insights_used,
    personalizationScore: result.data.personalization_score,
  };
}

export function formatEmail(email: OutreachEmail): string {
  return `Subject: ${email.subjectLine}\n\n${email.emailBody}`;
}

// ============================================================================
// Consumer
// ============================================================================

export class OutreachDrafter implements DownstreamConsumer {
  readonly name = 'outreach';
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly model: LanguageModel,
    private readonly sender: SenderSettings,
    private readonly deps: OutreachDeps
  ) {
    this.logger = deps.logger ?? createLogger('outreach');
    this.metrics = deps.metrics ?? noopMetrics;
  }

  async draft(record: ResearchRecord): Promise<OutreachEmail> {
    const startTime = Date.now();
    const template = await loadPromptTemplate(OUTREACH_PROMPT_FILE, this.deps.promptsDir);
    const prompt = buildOutreachPrompt(template, record, this.sender);

    try {
      const text = await this.deps.policy.run('draftOutreach', (signal) =>
        this.model.complete(prompt, { system: OUTREACH_SYSTEM_PROMPT, signal })
      );
      const email = parseOutreachResponse(text);

      this.logger.info('Outreach email drafted', {
        runId: record.runId,
        personalizationScore: email.personalizationScore,
        insights: email.keyInsightsUsed.length,
      });
      this.metrics.timing('outreach.duration', Date.now() - startTime);
      return email;
    } catch (error) {
      const classified = classifyError(error, 'outreach drafting');
      this.logger.error('Outreach drafting failed', { runId: record.runId, code: classified.code, error: classified.message });
      this.metrics.increment('outreach.failed', { code: classified.code });
      throw classified;
    }
  }

  async consume(record: ResearchRecord): Promise<void> {
    const email = await this.draft(record);
    if (!this.deps.storage) {
      return;
    }

    await this.deps.storage.save(
      record.runId,
      'outreach',
      JSON.stringify(
        {
          subject_line: email.subjectLine,
          email_body: email.emailBody,
          key_insights_used: email.keyInsightsUsed,
          personalization_score: email.personalizationScore,
          text: formatEmail(email),
        },
        null,
        2
      ),
      { contentType: 'application/json' }
    );

    const marked = await markArtifactComplete(record.runId, 'outreach', this.deps.storage);
    if (!marked.success) {
      this.logger.warn('Could not mark outreach artifact complete', { runId: record.runId, error: marked.error?.message });
    }
  }
}

export default {
  OutreachDrafter,
  buildOutreachPrompt,
  parseOutreachResponse,
  formatEmail,
  summarizeRecord,
};

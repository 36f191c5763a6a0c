/**
 * LLM Module
 *
 * Thin Claude client shared by the extraction capability and the outreach
 * drafter, plus prompt template loading and JSON response parsing.
 *
 * Retries are not handled here: callers go through an ExternalCallPolicy,
 * so the SDK's own retry loop is disabled.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock, Message, MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { ResearchError, classifyError, type ResearchErrorCode } from '../errors/index.js';
import type { Logger, Metrics } from '../observability/index.js';
import { createLogger, noopMetrics } from '../observability/index.js';
import type { PipelineConfig } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CompletionOptions {
  system?: string;
  signal?: AbortSignal;
  maxTokens?: number;
}

/**
 * Text-in, text-out language model capability
 */
export interface LanguageModel {
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * The slice of the Anthropic Messages API the client relies on
 */
export interface MessagesApi {
  create(body: MessageCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<Message>;
}

export type ClaudeSettings = PipelineConfig['llm'];

export const DEFAULT_SYSTEM_PROMPT =
  'You are a meticulous marketing research analyst. You MUST output ONLY valid JSON that conforms to the structure requested in the prompt. No markdown code fences, no explanatory text.';

// ============================================================================
// Claude Client
// ============================================================================

export class ClaudeClient implements LanguageModel {
  readonly model: string;
  private readonly messages: MessagesApi;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly settings: ClaudeSettings,
    deps: { messages?: MessagesApi; logger?: Logger; metrics?: Metrics } = {}
  ) {
    this.model = settings.model;
    this.logger = deps.logger ?? createLogger('llm');
    this.metrics = deps.metrics ?? noopMetrics;

    if (deps.messages) {
      this.messages = deps.messages;
    } else {
      if (!settings.apiKey) {
        throw new ResearchError('CREDENTIAL_INVALID', 'ANTHROPIC_API_KEY is required. Set it in config or environment variable.');
      }
      const client = new Anthropic({
        apiKey: settings.apiKey,
        timeout: settings.timeoutMs,
        maxRetries: 0,
      });
      this.messages = client.messages;
    }
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const startTime = Date.now();

    this.logger.info('Calling Claude API', {
      model: this.model,
      promptLength: prompt.length,
    });
    this.metrics.increment('llm.claude.calls', { model: this.model });

    let response: Message;
    try {
      response = await this.messages.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? this.settings.maxTokens,
          temperature: this.settings.temperature,
          system: options.system ?? DEFAULT_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal }
      );
    } catch (error) {
      const classified = classifyError(error, 'claude');
      this.logger.error('Claude API call failed', { code: classified.code, error: classified.message });
      this.metrics.increment('llm.claude.errors', { code: classified.code });
      throw classified;
    }

    const textBlock = response.content.find((block: ContentBlock) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new ResearchError('UNAVAILABLE', 'No text content in Claude response');
    }

    this.logger.info('Claude API response received', {
      model: this.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      stopReason: response.stop_reason,
    });
    this.metrics.timing('llm.claude.duration', Date.now() - startTime, { model: this.model });
    this.metrics.gauge('llm.claude.output_tokens', response.usage.output_tokens, { model: this.model });

    return textBlock.text;
  }
}

// ============================================================================
// Prompts
// ============================================================================

/**
 * Directory holding prompt templates, next to src/ and dist/
 */
export function getPromptsDir(): string {
  return join(__dirname, '..', '..', 'prompts');
}

const templateCache = new Map<string, Promise<string>>();

/**
 * Load a prompt template by file name, once per process
 */
export function loadPromptTemplate(fileName: string, promptsDir: string = getPromptsDir()): Promise<string> {
  const path = join(promptsDir, fileName);
  const cached = templateCache.get(path);
  if (cached) {
    return cached;
  }
  const loading = readFile(path, 'utf-8').catch((error: unknown) => {
    templateCache.delete(path);
    throw new ResearchError('CONFIG_INVALID', `Failed to load prompt template: ${path}`, { cause: error });
  });
  templateCache.set(path, loading);
  return loading;
}

/**
 * Replace every `{{name}}` placeholder with its value
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => variables[name] ?? match);
}

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * Remove a surrounding markdown code fence if present
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Parse a model response that should contain a single JSON object
 *
 * @throws ResearchError with `code` when the text holds no JSON object
 */
export function parseJsonObject(
  text: string,
  code: ResearchErrorCode = 'EXTRACTION_PARSE_ERROR'
): Record<string, unknown> {
  const cleaned = stripCodeFences(text);
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new ResearchError(code, 'Response contains no JSON object', {
      details: { responsePreview: cleaned.substring(0, 500) },
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned.slice(start, end + 1));
  } catch (parseError) {
    throw new ResearchError(code, 'Failed to parse response as JSON', {
      cause: parseError,
      details: { responsePreview: cleaned.substring(0, 500) },
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ResearchError(code, 'Response JSON is not an object');
  }
  return { ...parsed };
}

export default {
  ClaudeClient,
  loadPromptTemplate,
  renderTemplate,
  stripCodeFences,
  parseJsonObject,
};

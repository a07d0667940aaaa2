/**
 * Language Model Boundary
 *
 * Responsibilities:
 * - Define the text-in/text-out LanguageModel contract the pipeline calls
 * - Implement it on the Anthropic Messages API with rate-limit retries
 * - Build the prompts that ask for each agent type's `Label: value` format
 *
 * Nothing here interprets model output; that is the parser's job.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { QualificationRecord, SeedAttributes } from '../types/index.js';
import type { AgentType } from '../parser/index.js';
import { LanguageModelError } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';

// ============================================================================
// Contract
// ============================================================================

export interface CompletionOptions {
  /** System prompt override */
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Opaque text-in/text-out completion function
 */
export interface LanguageModel {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

// ============================================================================
// Claude
// ============================================================================

/**
 * Configuration for Claude API
 */
export interface ClaudeConfig {
  /** Anthropic API key (from ANTHROPIC_API_KEY env var) */
  apiKey?: string;
  /** Model ID (default: claude-sonnet-4-20250514) */
  model?: string;
  /** Maximum tokens for response (default: 1024) */
  maxTokens?: number;
  /** Temperature for generation (default: 0.2) */
  temperature?: number;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
}

export interface ClaudeLanguageModelOptions {
  logger?: Logger;
  metrics?: Metrics;
  /** Preconfigured client (takes precedence over apiKey/timeout) */
  client?: Anthropic;
  /** Wait function between retries */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_TIMEOUT = 60000;

/** Exponential backoff delays for rate limit handling */
const RATE_LIMIT_DELAYS_MS = [1000, 2000, 4000, 8000, 16000];

const DEFAULT_SYSTEM_PROMPT =
  'You are a sales qualification analyst. Answer only with the requested "Label: value" lines, one per line, with no other text.';

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whether a failed call is worth retrying after a pause (rate limit, overload)
 */
export function isRetryableModelError(error: unknown): boolean {
  if (error instanceof Anthropic.APIError && (error.status === 429 || error.status === 529)) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('rate_limit') || message.includes('429') || message.includes('overloaded');
}

export class ClaudeLanguageModel implements LanguageModel {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly sleep: (ms: number) => Promise<void>;

  /**
   * @throws LanguageModelError when no API key is configured and no client is given
   */
  constructor(config: ClaudeConfig = {}, options: ClaudeLanguageModelOptions = {}) {
    this.model = config.model || DEFAULT_MODEL;
    this.maxTokens = config.maxTokens || DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.sleep = options.sleep ?? sleep;

    if (options.client) {
      this.client = options.client;
      return;
    }
    if (!config.apiKey) {
      throw new LanguageModelError('ANTHROPIC_API_KEY is required. Set it in config or environment variable.');
    }
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeout || DEFAULT_TIMEOUT,
    });
  }

  /**
   * Call Claude with retry logic for rate limits
   *
   * @returns Concatenated text blocks of the response
   * @throws LanguageModelError when the call fails or retries are exhausted
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const startTime = Date.now();
    const model = this.model;
    const maxTokens = options.maxTokens ?? this.maxTokens;

    this.logger.info('Calling Claude API', {
      model,
      maxTokens,
      promptLength: prompt.length,
    });
    this.metrics.increment('llm.claude.calls', { model });

    let lastError: unknown = null;

    for (let attempt = 0; attempt < RATE_LIMIT_DELAYS_MS.length; attempt++) {
      try {
        const response = await this.client.messages.create({
          model,
          max_tokens: maxTokens,
          temperature: options.temperature ?? this.temperature,
          system: options.system ?? DEFAULT_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
        });

        const text = response.content
          .flatMap((block) => (block.type === 'text' ? [block.text] : []))
          .join('\n');
        if (!text) {
          throw new LanguageModelError('No text content in Claude response');
        }

        this.logger.info('Claude API response received', {
          model,
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          stopReason: response.stop_reason,
        });
        this.metrics.timing('llm.claude.duration', Date.now() - startTime, { model });
        this.metrics.gauge('llm.claude.output_tokens', response.usage.output_tokens, { model });

        return text;
      } catch (error: unknown) {
        lastError = error;

        if (isRetryableModelError(error) && attempt < RATE_LIMIT_DELAYS_MS.length - 1) {
          const delay = RATE_LIMIT_DELAYS_MS[attempt] ?? 1000;
          this.logger.warn(`Rate limited, retrying in ${delay}ms`, {
            attempt: attempt + 1,
            error: error instanceof Error ? error.message : String(error),
          });
          this.metrics.increment('llm.claude.rate_limit', { model });
          await this.sleep(delay);
          continue;
        }

        // Not a rate limit error or exhausted retries
        break;
      }
    }

    this.logger.error('Claude API call failed', {
      error: lastError instanceof Error ? lastError.message : String(lastError),
    });
    this.metrics.increment('llm.claude.errors', { model });

    if (lastError instanceof LanguageModelError) {
      throw lastError;
    }
    throw new LanguageModelError(
      lastError instanceof Error ? lastError.message : 'Unknown error calling Claude API',
      isRetryableModelError(lastError),
      lastError
    );
  }
}

// ============================================================================
// Prompts
// ============================================================================

export interface LeadContext {
  email?: string | null;
  seed?: SeedAttributes;
  record?: QualificationRecord | null;
}

export interface QualificationRequest {
  /** Inbound message or form submission text */
  message: string;
  subject?: string;
  lead?: LeadContext;
}

export interface ReplyRequest {
  replyText: string;
  subject?: string;
  lead?: LeadContext;
}

export interface MeetingRequest {
  requestText: string;
  preferredTimes?: string;
  lead?: LeadContext;
}

const RESPONSE_FORMATS: Record<AgentType, string> = {
  qualification: [
    'Disposition: [engaged/maybe/disinterested]',
    'Confidence: [0-100]',
    'Sentiment: [positive/neutral/negative]',
    'Urgency: [high/medium/low]',
    'Reasoning: [one or two sentences]',
    'Next Action: [specific recommended next step]',
  ].join('\n'),
  reply_analysis: [
    'Intent: [interested/meeting_request/info_request/neutral/objection/not_interested]',
    'Disposition: [engaged/maybe/disinterested]',
    'Confidence: [0-100]',
    'Sentiment: [positive/neutral/negative]',
    'Urgency: [high/medium/low]',
    'Follow Up Timing: [immediate/1-week/1-month/3-months/none]',
    'Reasoning: [one or two sentences]',
    'Next Action: [specific recommended next step]',
  ].join('\n'),
  meeting_request: [
    'Meeting Intent: [schedule_meeting/reschedule/cancel/inquiry]',
    'Meeting Type: [demo/consultation/discovery/follow-up]',
    'Urgency: [high/medium/low]',
    'Preferred Time: [extracted time preferences]',
    'Duration: [minutes]',
    'Suggested Datetime: [ISO-8601 date and time, or leave empty]',
    'Booking Action: [book/propose_times/clarify/none]',
    'Analysis: [one or two sentences]',
    'Recommended Response: [short reply to send]',
  ].join('\n'),
};

/**
 * The label block a model must answer with for an agent type
 */
export function responseFormat(agentType: AgentType): string {
  return RESPONSE_FORMATS[agentType];
}

function describeLead(lead: LeadContext = {}): string {
  const lines: string[] = [];
  const name = lead.record?.name ?? lead.seed?.name;
  const company = lead.record?.company ?? lead.seed?.company;
  const email = lead.record?.email ?? lead.email;

  if (name) lines.push(`- Name: ${name}`);
  if (company) lines.push(`- Company: ${company}`);
  if (email) lines.push(`- Email: ${email}`);
  if (lead.seed?.interest) lines.push(`- Stated interest: ${lead.seed.interest}`);
  if (lead.record) {
    lines.push(`- Current priority: ${lead.record.priority} (score ${lead.record.lead_score})`);
    if (lead.record.disposition) lines.push(`- Current disposition: ${lead.record.disposition}`);
    if (lead.record.reasoning) lines.push(`- Previous assessment: ${lead.record.reasoning}`);
  }

  return lines.length > 0 ? lines.join('\n') : '- No prior information';
}

function assemble(intro: string, sections: Array<[string, string]>, agentType: AgentType): string {
  const body = sections.map(([title, content]) => `${title}:\n${content}`).join('\n\n');
  return `${intro}\n\n${body}\n\nProvide your analysis in the following format:\n${responseFormat(agentType)}\n`;
}

export function buildQualificationPrompt(request: QualificationRequest): string {
  const sections: Array<[string, string]> = [['Lead', describeLead(request.lead)]];
  if (request.subject) {
    sections.push(['Subject', request.subject]);
  }
  sections.push(['Message', request.message.trim()]);

  return assemble(
    'Assess how likely this contact is to become a customer based on their message.',
    sections,
    'qualification'
  );
}

export function buildReplyAnalysisPrompt(request: ReplyRequest): string {
  const sections: Array<[string, string]> = [['Lead', describeLead(request.lead)]];
  if (request.subject) {
    sections.push(['Subject', request.subject]);
  }
  sections.push(['Reply', request.replyText.trim()]);

  return assemble(
    'Analyze this reply to our outreach. Classify the intent and re-assess the lead.',
    sections,
    'reply_analysis'
  );
}

export function buildMeetingRequestPrompt(request: MeetingRequest): string {
  const sections: Array<[string, string]> = [
    ['Lead', describeLead(request.lead)],
    ['Meeting Request', request.requestText.trim()],
  ];
  if (request.preferredTimes) {
    sections.push(['Preferred Times', request.preferredTimes]);
  }

  return assemble(
    "Analyze this meeting request to understand the lead's intent and scheduling preferences.",
    sections,
    'meeting_request'
  );
}

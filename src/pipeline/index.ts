/**
 * Qualification Pipeline
 *
 * Responsibilities:
 * - Turn model output for each agent type into a persisted record update
 * - Resolve the contact address to a lead before writing
 * - Append one audit event per processed response
 * - Wrap every outcome in a ModuleResult envelope
 *
 * Flow per call:
 * 1. Parse the response text (never fails; degradations are logged)
 * 2. Derive score and priority
 * 3. Resolve or create the lead
 * 4. Upsert the record
 * 5. Append the interaction event
 *
 * Usage:
 * const pipeline = new QualificationPipeline({ resolver, store, log });
 * const result = await pipeline.qualify({ address: 'jane@example.com', responseText });
 * if (result.success) console.log(result.data.record.priority);
 */

import type {
  InteractionEvent,
  LeadId,
  ModuleResult,
  QualificationRecord,
  SeedAttributes,
} from '../types/index.js';
import {
  degradedFields,
  parseMeetingRequestResponse,
  parseQualificationResponse,
  parseReplyAnalysisResponse,
  type MeetingRequestAnalysis,
  type ParseResult,
  type QualificationAssessment,
  type ReplyAnalysis,
} from '../parser/index.js';
import { applyBookingOutcome, scoreLead, type BookingOutcome, type ScoringResult } from '../scoring/index.js';
import type { IdentityResolver } from '../identity/index.js';
import type { QualificationStore } from '../store/index.js';
import type { InteractionLog } from '../interaction-log/index.js';
import {
  buildMeetingRequestPrompt,
  buildQualificationPrompt,
  buildReplyAnalysisPrompt,
  type LanguageModel,
} from '../llm/index.js';
import { toResultError } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

interface ContactInput {
  /** External contact address (email) */
  address: string;
  /** Attributes used only if the lead is new */
  seed?: SeedAttributes;
}

export interface ResponseInput extends ContactInput {
  /** Raw model output */
  responseText: string | null | undefined;
}

export interface MeetingResponseInput extends ResponseInput {
  /** Outcome of a booking attempt, when one was made */
  bookingConfirmed?: boolean;
}

export interface QualifyOutcome {
  leadId: LeadId;
  record: QualificationRecord;
  event: InteractionEvent;
  assessment: ParseResult<QualificationAssessment>;
  scoring: ScoringResult;
}

export interface ReplyOutcome {
  leadId: LeadId;
  record: QualificationRecord;
  event: InteractionEvent;
  analysis: ParseResult<ReplyAnalysis>;
  scoring: ScoringResult;
}

export interface MeetingOutcome {
  leadId: LeadId;
  record: QualificationRecord;
  event: InteractionEvent;
  analysis: ParseResult<MeetingRequestAnalysis>;
  booking: BookingOutcome | null;
}

export interface ModelQualifyInput extends ContactInput {
  message: string;
  subject?: string;
}

export interface ModelReplyInput extends ContactInput {
  replyText: string;
  subject?: string;
}

export interface ModelMeetingInput extends ContactInput {
  requestText: string;
  preferredTimes?: string;
  bookingConfirmed?: boolean;
}

export interface QualificationPipelineOptions {
  resolver: IdentityResolver;
  store: QualificationStore;
  log: InteractionLog;
  /** Required only for the *WithModel operations */
  model?: LanguageModel;
  logger?: Logger;
  metrics?: Metrics;
}

/** Recorded in reasoning when the model produced nothing usable */
const MODEL_FAILURE_PREFIX = 'Model call failed';

// ============================================================================
// Pipeline
// ============================================================================

export class QualificationPipeline {
  private readonly resolver: IdentityResolver;
  private readonly store: QualificationStore;
  private readonly log: InteractionLog;
  private readonly model: LanguageModel | undefined;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: QualificationPipelineOptions) {
    this.resolver = options.resolver;
    this.store = options.store;
    this.log = options.log;
    this.model = options.model;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Process a qualification response for a contact
   */
  async qualify(input: ResponseInput): Promise<ModuleResult<QualifyOutcome>> {
    return this.processQualification(input, null);
  }

  /**
   * Process a reply analysis response for a contact
   */
  async analyzeReply(input: ResponseInput): Promise<ModuleResult<ReplyOutcome>> {
    return this.processReply(input, null);
  }

  private async processQualification(
    input: ResponseInput,
    modelFailure: string | null
  ): Promise<ModuleResult<QualifyOutcome>> {
    return this.run('pipeline.qualify', async (setLeadId) => {
      const assessment = parseQualificationResponse(input.responseText);
      const scoring = scoreLead(assessment.values);

      const leadId = await this.resolver.resolveOrCreate(input.address, input.seed);
      setLeadId(leadId);
      this.reportDegradation(leadId, assessment);

      const { values } = assessment;
      const record = await this.store.upsert(leadId, {
        priority: scoring.priority,
        lead_score: scoring.lead_score,
        reasoning: explainReasoning(values.reasoning, modelFailure),
        next_action: values.next_action,
        disposition: values.disposition,
        disposition_confidence: values.confidence,
        sentiment: values.sentiment,
        urgency: values.urgency,
      });

      const event = await this.log.append(leadId, 'qualification', {
        ...values,
        model_failure: modelFailure,
        lead_score: scoring.lead_score,
        priority: scoring.priority,
        score_reasons: scoring.reasons,
        scoring_version: scoring.scoring_version,
        degraded_fields: degradedFields(assessment),
      });

      return { leadId, record, event, assessment, scoring };
    });
  }

  private async processReply(input: ResponseInput, modelFailure: string | null): Promise<ModuleResult<ReplyOutcome>> {
    return this.run('pipeline.analyze_reply', async (setLeadId) => {
      const analysis = parseReplyAnalysisResponse(input.responseText);
      const scoring = scoreLead(analysis.values);

      const leadId = await this.resolver.resolveOrCreate(input.address, input.seed);
      setLeadId(leadId);
      this.reportDegradation(leadId, analysis);

      const { values } = analysis;
      const record = await this.store.upsert(leadId, {
        priority: scoring.priority,
        lead_score: scoring.lead_score,
        reasoning: explainReasoning(values.reasoning, modelFailure),
        next_action: values.next_action,
        disposition: values.disposition,
        disposition_confidence: values.confidence,
        sentiment: values.sentiment,
        urgency: values.urgency,
        follow_up_timing: values.follow_up_timing,
        last_reply_analysis: summarizeReply(values),
      });

      const event = await this.log.append(leadId, 'reply_analyzed', {
        ...values,
        model_failure: modelFailure,
        lead_score: scoring.lead_score,
        priority: scoring.priority,
        score_reasons: scoring.reasons,
        scoring_version: scoring.scoring_version,
        degraded_fields: degradedFields(analysis),
      });

      return { leadId, record, event, analysis, scoring };
    });
  }

  /**
   * Process a meeting request response, optionally with a booking outcome
   *
   * A booking outcome re-scores the lead from the score stored at write time;
   * without one only the meeting status changes.
   */
  async recordMeetingRequest(input: MeetingResponseInput): Promise<ModuleResult<MeetingOutcome>> {
    return this.processMeeting(input, null);
  }

  private async processMeeting(
    input: MeetingResponseInput,
    modelFailure: string | null
  ): Promise<ModuleResult<MeetingOutcome>> {
    return this.run('pipeline.meeting_request', async (setLeadId) => {
      const analysis = parseMeetingRequestResponse(input.responseText);

      const leadId = await this.resolver.resolveOrCreate(input.address, input.seed);
      setLeadId(leadId);
      this.reportDegradation(leadId, analysis);

      const { values } = analysis;
      const confirmed = input.bookingConfirmed;
      let record: QualificationRecord;
      let booking: BookingOutcome | null = null;

      if (confirmed === undefined) {
        record = await this.store.upsert(leadId, {
          meeting_status: values.meeting_intent === 'cancel' ? 'cancelled' : 'requested',
        });
      } else {
        record = await this.store.update(leadId, (current) => ({
          ...applyBookingOutcome(current?.lead_score ?? Number.NaN, confirmed),
          meeting_scheduled: confirmed,
          meeting_status: confirmed ? 'confirmed' : 'not_confirmed',
        }));
        booking = {
          lead_score: record.lead_score,
          priority: record.priority,
          next_action: record.next_action,
          reasoning: record.reasoning,
        };
      }

      const event = await this.log.append(leadId, 'meeting_scheduled', {
        ...values,
        model_failure: modelFailure,
        booking_confirmed: confirmed ?? null,
        meeting_status: record.meeting_status,
        ...(booking ? { lead_score: booking.lead_score, priority: booking.priority } : {}),
        degraded_fields: degradedFields(analysis),
      });

      return { leadId, record, event, analysis, booking };
    });
  }

  // ==========================================================================
  // Model-driven variants
  // ==========================================================================

  async qualifyWithModel(input: ModelQualifyInput): Promise<ModuleResult<QualifyOutcome>> {
    const prompt = buildQualificationPrompt({
      message: input.message,
      subject: input.subject,
      lead: { email: input.address, seed: input.seed },
    });
    const completion = await this.completeOrDegrade('qualification', prompt);
    return this.processQualification({ ...input, responseText: completion.text }, completion.failure);
  }

  async analyzeReplyWithModel(input: ModelReplyInput): Promise<ModuleResult<ReplyOutcome>> {
    const prompt = buildReplyAnalysisPrompt({
      replyText: input.replyText,
      subject: input.subject,
      lead: { email: input.address, seed: input.seed, record: await this.currentRecord(input.address) },
    });
    const completion = await this.completeOrDegrade('reply_analysis', prompt);
    return this.processReply({ ...input, responseText: completion.text }, completion.failure);
  }

  async recordMeetingRequestWithModel(input: ModelMeetingInput): Promise<ModuleResult<MeetingOutcome>> {
    const prompt = buildMeetingRequestPrompt({
      requestText: input.requestText,
      preferredTimes: input.preferredTimes,
      lead: { email: input.address, seed: input.seed, record: await this.currentRecord(input.address) },
    });
    const completion = await this.completeOrDegrade('meeting_request', prompt);
    return this.processMeeting({ ...input, responseText: completion.text }, completion.failure);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async run<T>(
    module: string,
    task: (setLeadId: (leadId: LeadId) => void) => Promise<T>
  ): Promise<ModuleResult<T>> {
    const startTime = Date.now();
    const timestamp = new Date().toISOString();
    let leadId: LeadId = '';

    try {
      const data = await task((resolved) => {
        leadId = resolved;
      });
      this.metrics.timing(`${module}.duration`, Date.now() - startTime);
      this.metrics.increment(`${module}.success`);
      return {
        success: true,
        data,
        metadata: { leadId, module, timestamp, duration: Date.now() - startTime },
      };
    } catch (error: unknown) {
      const resultError = toResultError(error);
      this.logger.error(`${module} failed`, { leadId, code: resultError.code, error: resultError.message });
      this.metrics.increment(`${module}.error`, { code: resultError.code });
      return {
        success: false,
        error: resultError,
        metadata: { leadId, module, timestamp, duration: Date.now() - startTime },
      };
    }
  }

  private reportDegradation(leadId: LeadId, result: ParseResult<unknown>): void {
    if (result.degraded.length === 0 && result.clamped.length === 0) {
      return;
    }
    this.metrics.increment('parser.degraded', { agent_type: result.agentType });
    this.logger.warn('Model response degraded to defaults', {
      leadId,
      agentType: result.agentType,
      fields: degradedFields(result),
      clamped: result.clamped,
      recognizedLines: result.recognizedLines,
    });
  }

  private async completeOrDegrade(
    agentType: string,
    prompt: string
  ): Promise<{ text: string; failure: string | null }> {
    if (!this.model) {
      return { text: '', failure: 'no language model configured' };
    }
    try {
      return { text: await this.model.complete(prompt), failure: null };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Language model call failed, using default parse', { agentType, error: message });
      this.metrics.increment('pipeline.model_failure', { agent_type: agentType });
      return { text: '', failure: message };
    }
  }

  private async currentRecord(address: string): Promise<QualificationRecord | null> {
    try {
      const leadId = await this.resolver.lookup(address);
      return leadId ? await this.store.get(leadId) : null;
    } catch (error: unknown) {
      // Context is best effort; the main call reports real failures
      this.logger.debug('No lead context for prompt', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

/**
 * Parsed reasoning, or the model failure when the model produced nothing
 */
export function explainReasoning(reasoning: string, modelFailure: string | null): string {
  if (modelFailure && !reasoning) {
    return `${MODEL_FAILURE_PREFIX}: ${modelFailure}`;
  }
  return reasoning;
}

/**
 * One-line summary stored as last_reply_analysis
 */
export function summarizeReply(values: ReplyAnalysis): string {
  const reasoning = values.reasoning ? ` - ${values.reasoning}` : '';
  return `${values.intent} (${values.disposition}, ${values.sentiment})${reasoning}`;
}

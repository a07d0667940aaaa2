/**
 * Response Parser Module
 *
 * Responsibilities:
 * - Scan free-form model output for `Label: value` lines
 * - Normalize labels to the internal field names of an agent type
 * - Coerce values to typed enums, clamped integers and text
 * - Substitute documented defaults for anything missing or malformed
 *
 * The parser is total: every call returns a complete record. A substituted
 * default is reported as a degradation in the result, never thrown.
 *
 * Usage:
 * const { values, degraded } = parseQualificationResponse(modelText);
 */

import {
  DISPOSITIONS,
  FOLLOW_UP_TIMINGS,
  SENTIMENTS,
  URGENCIES,
  type Disposition,
  type FollowUpTiming,
  type Sentiment,
  type Urgency,
} from '../types/index.js';

// ============================================================================
// Field Specifications
// ============================================================================

export interface EnumFieldSpec<V extends string> {
  kind: 'enum';
  /** Accepted labels, compared after label normalization */
  labels: readonly string[];
  values: readonly V[];
  fallback: V;
  /** Folded spelling → canonical value */
  aliases?: Readonly<Record<string, V>>;
}

export interface IntegerFieldSpec {
  kind: 'integer';
  labels: readonly string[];
  min: number;
  max: number;
  fallback: number;
}

export interface TextFieldSpec {
  kind: 'text';
  labels: readonly string[];
  fallback: string;
  validate?: (value: string) => boolean;
}

export type FieldSpec = EnumFieldSpec<string> | IntegerFieldSpec | TextFieldSpec;

export type AgentType = 'qualification' | 'reply_analysis' | 'meeting_request';

export type ParseDegradationReason = 'missing' | 'unrecognized_value' | 'not_numeric' | 'empty_value';

/**
 * A field whose value could not be used and was replaced by its default
 */
export interface ParseDegradation {
  field: string;
  reason: ParseDegradationReason;
  raw?: string;
  fallback: string | number;
}

export interface ParseResult<T> {
  agentType: AgentType;
  values: T;
  /** True where the default was substituted */
  defaulted: Record<keyof T, boolean>;
  degraded: ParseDegradation[];
  /** Integer fields whose parsed value was pulled into range */
  clamped: string[];
  /** Lines whose label matched a field of this agent type */
  recognizedLines: number;
}

interface FieldOutcome<T> {
  value: T;
  defaulted: boolean;
}

// ============================================================================
// Agent Field Sets
// ============================================================================

export const REPLY_INTENTS = [
  'interested',
  'meeting_request',
  'info_request',
  'neutral',
  'objection',
  'not_interested',
] as const;
export type ReplyIntent = (typeof REPLY_INTENTS)[number];

export const MEETING_INTENTS = ['schedule_meeting', 'reschedule', 'cancel', 'inquiry'] as const;
export type MeetingIntent = (typeof MEETING_INTENTS)[number];

export const BOOKING_ACTIONS = ['book', 'propose_times', 'clarify', 'none'] as const;
export type BookingAction = (typeof BOOKING_ACTIONS)[number];

const DISPOSITION_FIELD: EnumFieldSpec<Disposition> = {
  kind: 'enum',
  labels: ['disposition', 'lead_disposition'],
  values: DISPOSITIONS,
  fallback: 'unset',
  aliases: {
    interested: 'engaged',
    hot: 'engaged',
    warm: 'maybe',
    undecided: 'maybe',
    not_interested: 'disinterested',
    uninterested: 'disinterested',
    cold: 'disinterested',
  },
};

const CONFIDENCE_FIELD: IntegerFieldSpec = {
  kind: 'integer',
  labels: ['confidence', 'disposition_confidence', 'confidence_score'],
  min: 0,
  max: 100,
  fallback: 50,
};

const SENTIMENT_FIELD: EnumFieldSpec<Sentiment> = {
  kind: 'enum',
  labels: ['sentiment', 'tone'],
  values: SENTIMENTS,
  fallback: 'neutral',
  aliases: {
    mixed: 'neutral',
    positive_sentiment: 'positive',
    negative_sentiment: 'negative',
  },
};

const URGENCY_FIELD: EnumFieldSpec<Urgency> = {
  kind: 'enum',
  labels: ['urgency', 'urgency_level'],
  values: URGENCIES,
  fallback: 'not_specified',
  aliases: {
    urgent: 'high',
    med: 'medium',
    normal: 'medium',
    unknown: 'not_specified',
    unspecified: 'not_specified',
    later: 'low',
  },
};

const REASONING_FIELD: TextFieldSpec = {
  kind: 'text',
  labels: ['reasoning', 'reason', 'rationale', 'analysis_reasoning'],
  fallback: '',
};

const FOLLOW_UP_FIELD: EnumFieldSpec<FollowUpTiming> = {
  kind: 'enum',
  labels: ['follow_up_timing', 'follow_up', 'followup_timing'],
  values: FOLLOW_UP_TIMINGS,
  fallback: '1-week',
  aliases: {
    asap: 'immediate',
    now: 'immediate',
    one_week: '1-week',
    a_week: '1-week',
    one_month: '1-month',
    a_month: '1-month',
    three_months: '3-months',
    quarter: '3-months',
    never: 'none',
  },
};

const REPLY_INTENT_FIELD: EnumFieldSpec<ReplyIntent> = {
  kind: 'enum',
  labels: ['intent', 'reply_intent'],
  values: REPLY_INTENTS,
  fallback: 'neutral',
  aliases: {
    meeting: 'meeting_request',
    information_request: 'info_request',
    question: 'info_request',
    uninterested: 'not_interested',
  },
};

export const QUALIFICATION_FIELDS = {
  disposition: DISPOSITION_FIELD,
  confidence: CONFIDENCE_FIELD,
  sentiment: SENTIMENT_FIELD,
  urgency: URGENCY_FIELD,
  reasoning: REASONING_FIELD,
  next_action: {
    kind: 'text',
    labels: ['next_action', 'recommended_action', 'next_step'],
    fallback: 'Manual review required',
  } satisfies TextFieldSpec,
} as const;

export const REPLY_ANALYSIS_FIELDS = {
  ...QUALIFICATION_FIELDS,
  next_action: {
    kind: 'text',
    labels: ['next_action', 'recommended_action', 'next_step'],
    fallback: 'Follow up via email',
  } satisfies TextFieldSpec,
  follow_up_timing: FOLLOW_UP_FIELD,
  intent: REPLY_INTENT_FIELD,
} as const;

export const MEETING_REQUEST_FIELDS = {
  meeting_intent: {
    kind: 'enum',
    labels: ['meeting_intent', 'intent'],
    values: MEETING_INTENTS,
    fallback: 'inquiry',
    aliases: { schedule: 'schedule_meeting', book: 'schedule_meeting', cancellation: 'cancel' },
  } satisfies EnumFieldSpec<MeetingIntent>,
  meeting_type: { kind: 'text', labels: ['meeting_type', 'type'], fallback: 'consultation' } satisfies TextFieldSpec,
  urgency: URGENCY_FIELD,
  preferred_time: { kind: 'text', labels: ['preferred_time', 'time_preferences'], fallback: '' } satisfies TextFieldSpec,
  duration: {
    kind: 'integer',
    labels: ['duration', 'preferred_duration', 'meeting_duration'],
    min: 15,
    max: 240,
    fallback: 30,
  } satisfies IntegerFieldSpec,
  analysis: { kind: 'text', labels: ['analysis', 'meeting_analysis'], fallback: '' } satisfies TextFieldSpec,
  recommended_response: { kind: 'text', labels: ['recommended_response', 'response'], fallback: '' } satisfies TextFieldSpec,
  booking_action: {
    kind: 'enum',
    labels: ['booking_action'],
    values: BOOKING_ACTIONS,
    fallback: 'none',
    aliases: { propose: 'propose_times', confirm: 'book' },
  } satisfies EnumFieldSpec<BookingAction>,
  suggested_datetime: {
    kind: 'text',
    labels: ['suggested_datetime', 'suggested_time'],
    fallback: '',
    validate: (value) => !Number.isNaN(Date.parse(value)),
  } satisfies TextFieldSpec,
} as const;

export interface QualificationAssessment {
  disposition: Disposition;
  confidence: number;
  sentiment: Sentiment;
  urgency: Urgency;
  reasoning: string;
  next_action: string;
}

export interface ReplyAnalysis extends QualificationAssessment {
  follow_up_timing: FollowUpTiming;
  intent: ReplyIntent;
}

export interface MeetingRequestAnalysis {
  meeting_intent: MeetingIntent;
  meeting_type: string;
  urgency: Urgency;
  preferred_time: string;
  duration: number;
  analysis: string;
  recommended_response: string;
  booking_action: BookingAction;
  suggested_datetime: string;
}

// ============================================================================
// Normalization Helpers
// ============================================================================

/**
 * Normalize a label to internal field-name form
 * "Next Action", "next_action" and "NEXT-ACTION" all become "next_action"
 */
export function normalizeLabel(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Fold a value for enum comparison: lowercase, punctuation runs to "_"
 */
function foldValue(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Strip list markers and bold markup an LLM tends to wrap labels in
 */
function cleanLine(line: string): string {
  return line
    .trim()
    .replace(/^(?:[-*•]\s+|\d+[.)]\s+)/, '')
    .replace(/\*\*/g, '')
    .trim();
}

const LINE_PATTERN = /^([A-Za-z][A-Za-z0-9 _-]{0,60}?)\s*:\s*(.*)$/;

function buildLabelIndex(fields: Readonly<Record<string, FieldSpec>>): Map<string, string> {
  const index = new Map<string, string>();
  for (const [field, spec] of Object.entries(fields)) {
    for (const label of spec.labels) {
      index.set(normalizeLabel(label), field);
    }
  }
  return index;
}

/**
 * Match a raw value against an enum field
 *
 * Order: exact (folded), alias, then the longest value or alias the raw
 * text starts with ("High - wants a demo" → "high").
 */
export function matchEnumValue<V extends string>(raw: string, spec: EnumFieldSpec<V>): V | null {
  const folded = foldValue(raw);
  if (!folded) {
    return null;
  }

  const candidates: Array<[string, V]> = spec.values.map((value): [string, V] => [
    foldValue(value),
    value,
  ]);
  for (const [alias, value] of Object.entries(spec.aliases ?? {})) {
    candidates.push([alias, value]);
  }

  for (const [key, value] of candidates) {
    if (key === folded) {
      return value;
    }
  }

  let best: [string, V] | null = null;
  for (const candidate of candidates) {
    if (folded.startsWith(`${candidate[0]}_`) && (!best || candidate[0].length > best[0].length)) {
      best = candidate;
    }
  }
  return best ? best[1] : null;
}

// ============================================================================
// Scanning
// ============================================================================

interface ScanResult {
  raw: Map<string, string>;
  recognizedLines: number;
}

/**
 * Collect the first value of every known label in the text
 *
 * Lines that are not a known label continue the preceding text field.
 */
export function scanLabeledLines(
  text: string | null | undefined,
  fields: Readonly<Record<string, FieldSpec>>
): ScanResult {
  const labelIndex = buildLabelIndex(fields);
  const raw = new Map<string, string>();
  let recognizedLines = 0;
  let current: string | null = null;

  if (typeof text !== 'string' || text.length === 0) {
    return { raw, recognizedLines };
  }

  for (const rawLine of text.split(/\r?\n/)) {
    const line = cleanLine(rawLine);
    if (!line) {
      current = null;
      continue;
    }

    const match = LINE_PATTERN.exec(line);
    const field = match ? labelIndex.get(normalizeLabel(match[1] ?? '')) : undefined;

    if (match && field) {
      recognizedLines++;
      if (raw.has(field)) {
        current = null;
      } else {
        raw.set(field, (match[2] ?? '').trim());
        current = field;
      }
      continue;
    }

    if (current !== null && fields[current]?.kind === 'text') {
      raw.set(current, `${raw.get(current) ?? ''} ${line}`.trim());
    } else {
      current = null;
    }
  }

  return { raw, recognizedLines };
}

/**
 * Reads typed fields out of a scan, recording every substitution
 */
class FieldReader {
  readonly degraded: ParseDegradation[] = [];
  readonly clamped: string[] = [];

  constructor(private readonly scan: ScanResult) {}

  get recognizedLines(): number {
    return this.scan.recognizedLines;
  }

  private fallback<T extends string | number>(
    field: string,
    reason: ParseDegradationReason,
    value: T,
    raw?: string
  ): FieldOutcome<T> {
    const degradation: ParseDegradation = { field, reason, fallback: value };
    if (raw !== undefined) {
      degradation.raw = raw;
    }
    this.degraded.push(degradation);
    return { value, defaulted: true };
  }

  enumValue<V extends string>(field: string, spec: EnumFieldSpec<V>): FieldOutcome<V> {
    const raw = this.scan.raw.get(field);
    if (raw === undefined) {
      return this.fallback(field, 'missing', spec.fallback);
    }
    if (!raw) {
      return this.fallback(field, 'empty_value', spec.fallback, raw);
    }
    const matched = matchEnumValue(raw, spec);
    return matched === null
      ? this.fallback(field, 'unrecognized_value', spec.fallback, raw)
      : { value: matched, defaulted: false };
  }

  integer(field: string, spec: IntegerFieldSpec): FieldOutcome<number> {
    const raw = this.scan.raw.get(field);
    if (raw === undefined) {
      return this.fallback(field, 'missing', spec.fallback);
    }
    if (!raw) {
      return this.fallback(field, 'empty_value', spec.fallback, raw);
    }
    const numeric = /-?\d+(?:\.\d+)?/.exec(raw);
    if (!numeric) {
      return this.fallback(field, 'not_numeric', spec.fallback, raw);
    }
    // Digit runs too long for a double parse to ±Infinity and clamp to a bound
    const parsed = Math.round(Number.parseFloat(numeric[0]));
    const value = Math.min(spec.max, Math.max(spec.min, parsed));
    if (value !== parsed) {
      this.clamped.push(field);
    }
    return { value, defaulted: false };
  }

  text(field: string, spec: TextFieldSpec): FieldOutcome<string> {
    const raw = this.scan.raw.get(field);
    if (raw === undefined) {
      return this.fallback(field, 'missing', spec.fallback);
    }
    const value = raw.trim();
    if (!value) {
      return this.fallback(field, 'empty_value', spec.fallback, raw);
    }
    if (spec.validate && !spec.validate(value)) {
      return this.fallback(field, 'unrecognized_value', spec.fallback, raw);
    }
    return { value, defaulted: false };
  }
}

// ============================================================================
// Public Parsers
// ============================================================================

/**
 * Parse a lead qualification response
 *
 * @param text - Raw model output
 * @returns Complete assessment; missing or malformed fields carry defaults
 */
export function parseQualificationResponse(
  text: string | null | undefined
): ParseResult<QualificationAssessment> {
  const fields = QUALIFICATION_FIELDS;
  const reader = new FieldReader(scanLabeledLines(text, fields));

  const disposition = reader.enumValue('disposition', fields.disposition);
  const confidence = reader.integer('confidence', fields.confidence);
  const sentiment = reader.enumValue('sentiment', fields.sentiment);
  const urgency = reader.enumValue('urgency', fields.urgency);
  const reasoning = reader.text('reasoning', fields.reasoning);
  const nextAction = reader.text('next_action', fields.next_action);

  return {
    agentType: 'qualification',
    values: {
      disposition: disposition.value,
      confidence: confidence.value,
      sentiment: sentiment.value,
      urgency: urgency.value,
      reasoning: reasoning.value,
      next_action: nextAction.value,
    },
    defaulted: {
      disposition: disposition.defaulted,
      confidence: confidence.defaulted,
      sentiment: sentiment.defaulted,
      urgency: urgency.defaulted,
      reasoning: reasoning.defaulted,
      next_action: nextAction.defaulted,
    },
    degraded: reader.degraded,
    clamped: reader.clamped,
    recognizedLines: reader.recognizedLines,
  };
}

/**
 * Parse an email reply analysis response
 */
export function parseReplyAnalysisResponse(text: string | null | undefined): ParseResult<ReplyAnalysis> {
  const fields = REPLY_ANALYSIS_FIELDS;
  const reader = new FieldReader(scanLabeledLines(text, fields));

  const disposition = reader.enumValue('disposition', fields.disposition);
  const confidence = reader.integer('confidence', fields.confidence);
  const sentiment = reader.enumValue('sentiment', fields.sentiment);
  const urgency = reader.enumValue('urgency', fields.urgency);
  const reasoning = reader.text('reasoning', fields.reasoning);
  const nextAction = reader.text('next_action', fields.next_action);
  const followUp = reader.enumValue('follow_up_timing', fields.follow_up_timing);
  const intent = reader.enumValue('intent', fields.intent);

  return {
    agentType: 'reply_analysis',
    values: {
      disposition: disposition.value,
      confidence: confidence.value,
      sentiment: sentiment.value,
      urgency: urgency.value,
      reasoning: reasoning.value,
      next_action: nextAction.value,
      follow_up_timing: followUp.value,
      intent: intent.value,
    },
    defaulted: {
      disposition: disposition.defaulted,
      confidence: confidence.defaulted,
      sentiment: sentiment.defaulted,
      urgency: urgency.defaulted,
      reasoning: reasoning.defaulted,
      next_action: nextAction.defaulted,
      follow_up_timing: followUp.defaulted,
      intent: intent.defaulted,
    },
    degraded: reader.degraded,
    clamped: reader.clamped,
    recognizedLines: reader.recognizedLines,
  };
}

/**
 * Parse a meeting request analysis response
 */
export function parseMeetingRequestResponse(
  text: string | null | undefined
): ParseResult<MeetingRequestAnalysis> {
  const fields = MEETING_REQUEST_FIELDS;
  const reader = new FieldReader(scanLabeledLines(text, fields));

  const meetingIntent = reader.enumValue('meeting_intent', fields.meeting_intent);
  const meetingType = reader.text('meeting_type', fields.meeting_type);
  const urgency = reader.enumValue('urgency', fields.urgency);
  const preferredTime = reader.text('preferred_time', fields.preferred_time);
  const duration = reader.integer('duration', fields.duration);
  const analysis = reader.text('analysis', fields.analysis);
  const recommendedResponse = reader.text('recommended_response', fields.recommended_response);
  const bookingAction = reader.enumValue('booking_action', fields.booking_action);
  const suggestedDatetime = reader.text('suggested_datetime', fields.suggested_datetime);

  return {
    agentType: 'meeting_request',
    values: {
      meeting_intent: meetingIntent.value,
      meeting_type: meetingType.value,
      urgency: urgency.value,
      preferred_time: preferredTime.value,
      duration: duration.value,
      analysis: analysis.value,
      recommended_response: recommendedResponse.value,
      booking_action: bookingAction.value,
      suggested_datetime: suggestedDatetime.value,
    },
    defaulted: {
      meeting_intent: meetingIntent.defaulted,
      meeting_type: meetingType.defaulted,
      urgency: urgency.defaulted,
      preferred_time: preferredTime.defaulted,
      duration: duration.defaulted,
      analysis: analysis.defaulted,
      recommended_response: recommendedResponse.defaulted,
      booking_action: bookingAction.defaulted,
      suggested_datetime: suggestedDatetime.defaulted,
    },
    degraded: reader.degraded,
    clamped: reader.clamped,
    recognizedLines: reader.recognizedLines,
  };
}

/**
 * Names of the fields that fell back to defaults
 */
export function degradedFields(result: ParseResult<unknown>): string[] {
  return result.degraded.map((d) => d.field);
}

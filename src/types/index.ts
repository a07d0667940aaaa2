/**
 * Core type definitions for the lead qualification core
 *
 * This module exports the shared data shapes used across the system:
 * enumerations, the qualification record, interaction events and the
 * module result envelope.
 */

/**
 * Stable internal identifier for a lead
 * Format: lead_<16 lowercase hex characters>
 */
export type LeadId = string;

// ============================================================================
// Enumerations
// ============================================================================

export const PRIORITIES = ['high', 'medium', 'low'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const DISPOSITIONS = ['engaged', 'maybe', 'disinterested', 'unset'] as const;
export type Disposition = (typeof DISPOSITIONS)[number];

export const SENTIMENTS = ['positive', 'neutral', 'negative'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const URGENCIES = ['high', 'medium', 'low', 'not_specified'] as const;
export type Urgency = (typeof URGENCIES)[number];

export const FOLLOW_UP_TIMINGS = ['immediate', '1-week', '1-month', '3-months', 'none'] as const;
export type FollowUpTiming = (typeof FOLLOW_UP_TIMINGS)[number];

// ============================================================================
// Qualification Record
// ============================================================================

/**
 * Fields every record must carry on every write path
 */
export const REQUIRED_FIELDS = ['priority', 'lead_score', 'reasoning', 'next_action'] as const;
export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * The evolving qualification state of one lead.
 *
 * Fields after `next_action` are optional in the domain sense: they may be
 * null, and records persisted before a field was introduced read back with
 * that field's documented default (see the field registry in store/).
 */
export interface QualificationRecord {
  lead_id: LeadId;

  // v1
  priority: Priority;
  lead_score: number;
  reasoning: string;
  next_action: string;
  disposition: Disposition | null;
  disposition_confidence: number | null;
  sentiment: Sentiment | null;
  urgency: Urgency | null;
  follow_up_timing: FollowUpTiming | null;

  // v2
  name: string | null;
  company: string | null;
  email: string | null;
  last_reply_analysis: string | null;

  // v3
  meeting_scheduled: boolean;
  meeting_status: string | null;

  /** Field-set version the record was last written with */
  schema_version: number;
  created_at: string;
  updated_at: string;

  /** Stored fields this build does not know about, kept verbatim */
  extensions: Record<string, unknown>;
}

/**
 * Fields a caller may write through upsert
 */
export type QualificationFields = Omit<
  QualificationRecord,
  'lead_id' | 'schema_version' | 'created_at' | 'updated_at'
>;

export type QualificationUpdate = Partial<QualificationFields>;

// ============================================================================
// Interaction Events
// ============================================================================

export const KNOWN_EVENT_TYPES = [
  'lead_created',
  'qualification',
  'reply_analyzed',
  'meeting_scheduled',
] as const;

/**
 * Event type tag. The set is open; the known tags get completion.
 */
export type InteractionEventType = (typeof KNOWN_EVENT_TYPES)[number] | (string & {});

export type EventPayload = Record<string, unknown>;

/**
 * One immutable entry of a lead's audit trail
 */
export interface InteractionEvent {
  lead_id: LeadId;
  event_type: InteractionEventType;
  payload: EventPayload;
  timestamp: string;
  /** Per-lead counter starting at 1 */
  sequence: number;
}

// ============================================================================
// Seed Attributes
// ============================================================================

/**
 * Attributes an intake collaborator knows about a contact on first sight
 */
export interface SeedAttributes {
  name?: string | null;
  company?: string | null;
  interest?: string | null;
  source?: string | null;
}

// ============================================================================
// Storage Substrate
// ============================================================================

/**
 * Metadata for one stored object
 */
export interface StoredObjectMetadata {
  collection: string;
  key: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

export interface StoredObject {
  content: string;
  metadata: StoredObjectMetadata;
}

/**
 * Key-value persistence substrate the Store and the Log sit on.
 *
 * Keys are `/`-separated segments of [A-Za-z0-9._@+-]. A single save replaces
 * the whole object, so a reader sees either the old or the new content.
 */
export interface StorageAdapter {
  save(collection: string, key: string, content: string): Promise<StoredObjectMetadata>;
  /** Write only if nothing is stored under the key; null when the key is taken */
  saveIfAbsent(collection: string, key: string, content: string): Promise<StoredObjectMetadata | null>;
  /** Null when nothing is stored under the key */
  load(collection: string, key: string): Promise<StoredObject | null>;
  exists(collection: string, key: string): Promise<boolean>;
  /** Keys in the collection starting with prefix, ascending */
  list(collection: string, prefix?: string): Promise<string[]>;
}

// ============================================================================
// Module Result
// ============================================================================

/**
 * Result envelope returned by the pipeline operations
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    leadId: LeadId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}

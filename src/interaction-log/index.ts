/**
 * Interaction Log Module
 *
 * Append-only audit trail of per-lead events. Each event is its own stored
 * object keyed by a zero-padded per-lead sequence number, so listing a
 * lead's keys yields its history in order. A sequence is claimed with a
 * create-if-absent write; losing the claim to another writer moves on to the
 * next number.
 *
 * Storage layout:
 * - events/{lead_id}/{sequence}.json
 *
 * Usage:
 * const log = new InteractionLog({ storage });
 * await log.append(leadId, 'qualification', { lead_score: 92 });
 * const events = await log.history(leadId);
 */

import { z } from 'zod';
import type {
  EventPayload,
  InteractionEvent,
  InteractionEventType,
  LeadId,
  StorageAdapter,
} from '../types/index.js';
import { KeyedLock } from '../concurrency/index.js';
import { AppendConflictError, CorruptRecordError, ValidationFailedError } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';

export const EVENTS_COLLECTION = 'events';

const SEQUENCE_WIDTH = 10;
const DEFAULT_MAX_APPEND_ATTEMPTS = 8;

const eventTypeSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z][a-z0-9_]*$/, 'event type must be snake_case');

const payloadSchema = z.record(z.unknown());

const storedEventSchema = z.object({
  lead_id: z.string().min(1),
  event_type: eventTypeSchema,
  payload: payloadSchema,
  timestamp: z.string().min(1),
  sequence: z.number().int().min(1),
});

/**
 * Storage key for an event
 */
export function eventKey(leadId: LeadId, sequence: number): string {
  return `${leadId}/${String(sequence).padStart(SEQUENCE_WIDTH, '0')}`;
}

/**
 * Most recent event of each type, in the order each type first appears
 */
export function latestEventsByType(
  events: InteractionEvent[]
): Map<InteractionEventType, InteractionEvent> {
  const latest = new Map<InteractionEventType, InteractionEvent>();
  for (const event of events) {
    latest.set(event.event_type, event);
  }
  return latest;
}

export interface InteractionLogOptions {
  storage: StorageAdapter;
  logger?: Logger;
  metrics?: Metrics;
  clock?: () => Date;
  /** Sequence claims to try before giving up with AppendConflictError */
  maxAppendAttempts?: number;
}

interface LeadCursor {
  nextSequence: number;
  lastTimestamp: number;
}

export class InteractionLog {
  private readonly storage: StorageAdapter;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly clock: () => Date;
  private readonly maxAppendAttempts: number;
  private readonly locks = new KeyedLock();
  private readonly cursors: Map<LeadId, LeadCursor> = new Map();

  constructor(options: InteractionLogOptions) {
    this.storage = options.storage;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.clock = options.clock ?? (() => new Date());
    this.maxAppendAttempts = options.maxAppendAttempts ?? DEFAULT_MAX_APPEND_ATTEMPTS;
  }

  /**
   * Record an event at the end of a lead's history
   *
   * @param leadId - Lead the event belongs to
   * @param eventType - Snake-case tag (lead_created, qualification, reply_analyzed, ...)
   * @param payload - JSON object; the log does not interpret it
   * @returns The stored event with its timestamp and sequence
   * @throws ValidationFailedError for a malformed type or non-object payload
   * @throws AppendConflictError when every sequence claim collides
   */
  async append(
    leadId: LeadId,
    eventType: InteractionEventType,
    payload: EventPayload
  ): Promise<InteractionEvent> {
    const type = eventTypeSchema.safeParse(eventType);
    if (!type.success) {
      throw new ValidationFailedError(`Invalid event type "${eventType}"`, ['event_type']);
    }
    const body = payloadSchema.safeParse(payload);
    if (!body.success) {
      throw new ValidationFailedError('Event payload must be a JSON object', ['payload']);
    }

    return this.locks.run(leadId, async () => {
      const cursor = await this.cursorFor(leadId);

      for (let attempt = 1; attempt <= this.maxAppendAttempts; attempt++) {
        const timestampMs = Math.max(this.clock().getTime(), cursor.lastTimestamp);
        const event: InteractionEvent = {
          lead_id: leadId,
          event_type: type.data,
          payload: body.data,
          timestamp: new Date(timestampMs).toISOString(),
          sequence: cursor.nextSequence,
        };

        const saved = await this.storage.saveIfAbsent(
          EVENTS_COLLECTION,
          eventKey(leadId, event.sequence),
          JSON.stringify(event, null, 2)
        );

        if (saved) {
          cursor.nextSequence = event.sequence + 1;
          cursor.lastTimestamp = timestampMs;
          this.metrics.increment('interaction_log.appended', { event_type: event.event_type });
          this.logger.debug('Interaction event appended', {
            leadId,
            eventType: event.event_type,
            sequence: event.sequence,
          });
          return event;
        }

        // Another writer took this sequence; resync from storage
        this.metrics.increment('interaction_log.sequence_conflict');
        const refreshed = await this.readCursor(leadId);
        cursor.nextSequence = Math.max(refreshed.nextSequence, cursor.nextSequence + 1);
        cursor.lastTimestamp = Math.max(refreshed.lastTimestamp, cursor.lastTimestamp);
      }

      this.logger.error('Could not append interaction event', {
        leadId,
        eventType: type.data,
        attempts: this.maxAppendAttempts,
      });
      throw new AppendConflictError(leadId, this.maxAppendAttempts);
    });
  }

  /**
   * Every event for a lead, oldest first; empty for an unknown lead
   */
  async history(leadId: LeadId): Promise<InteractionEvent[]> {
    const keys = await this.storage.list(EVENTS_COLLECTION, `${leadId}/`);
    const events = await Promise.all(keys.map((key) => this.loadEvent(key)));

    return events
      .filter((event): event is InteractionEvent => event !== null)
      .sort((a, b) => a.sequence - b.sequence);
  }

  /**
   * The most recent event of each distinct type, keyed by type
   */
  async latestByType(leadId: LeadId): Promise<Map<InteractionEventType, InteractionEvent>> {
    return latestEventsByType(await this.history(leadId));
  }

  private async cursorFor(leadId: LeadId): Promise<LeadCursor> {
    const cached = this.cursors.get(leadId);
    if (cached) {
      return cached;
    }
    const cursor = await this.readCursor(leadId);
    this.cursors.set(leadId, cursor);
    return cursor;
  }

  private async readCursor(leadId: LeadId): Promise<LeadCursor> {
    const keys = await this.storage.list(EVENTS_COLLECTION, `${leadId}/`);
    const lastKey = keys[keys.length - 1];
    if (lastKey === undefined) {
      return { nextSequence: 1, lastTimestamp: 0 };
    }

    const last = await this.loadEvent(lastKey);
    if (!last) {
      return { nextSequence: keys.length + 1, lastTimestamp: 0 };
    }
    return {
      nextSequence: last.sequence + 1,
      lastTimestamp: Date.parse(last.timestamp) || 0,
    };
  }

  private async loadEvent(key: string): Promise<InteractionEvent | null> {
    const stored = await this.storage.load(EVENTS_COLLECTION, key);
    if (!stored) {
      return null;
    }

    let document: unknown;
    try {
      document = JSON.parse(stored.content);
    } catch (error: unknown) {
      throw new CorruptRecordError(`${EVENTS_COLLECTION}/${key}`, [
        error instanceof Error ? error.message : 'invalid JSON',
      ]);
    }

    const result = storedEventSchema.safeParse(document);
    if (!result.success) {
      throw new CorruptRecordError(
        `${EVENTS_COLLECTION}/${key}`,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    return result.data;
  }
}

/**
 * Qualification Store Module
 *
 * Responsibilities:
 * - Hold one evolving qualification record per lead id
 * - Partial-merge updates under a per-lead lock
 * - Enforce the required-field invariant on every write
 * - Read records written under older field sets with documented defaults
 * - Preserve stored fields this build does not know about
 *
 * Storage layout:
 * - qualifications/{lead_id}.json (flat JSON document, whole-object writes)
 *
 * Usage:
 * const store = new QualificationStore({ storage });
 * await store.upsert(leadId, { priority: 'high', lead_score: 92 });
 */

import { z } from 'zod';
import {
  DISPOSITIONS,
  FOLLOW_UP_TIMINGS,
  PRIORITIES,
  REQUIRED_FIELDS,
  SENTIMENTS,
  URGENCIES,
  type LeadId,
  type QualificationFields,
  type QualificationRecord,
  type QualificationUpdate,
  type StorageAdapter,
} from '../types/index.js';
import { KeyedLock } from '../concurrency/index.js';
import { CorruptRecordError, ValidationFailedError } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';

export const QUALIFICATIONS_COLLECTION = 'qualifications';

// ============================================================================
// Field Registry
// ============================================================================

/**
 * Schema version that introduced each field
 */
export const FIELD_VERSIONS = {
  priority: 1,
  lead_score: 1,
  reasoning: 1,
  next_action: 1,
  disposition: 1,
  disposition_confidence: 1,
  sentiment: 1,
  urgency: 1,
  follow_up_timing: 1,
  name: 2,
  company: 2,
  email: 2,
  last_reply_analysis: 2,
  meeting_scheduled: 3,
  meeting_status: 3,
} as const satisfies Record<Exclude<keyof QualificationFields, 'extensions'>, number>;

export type RegisteredField = keyof typeof FIELD_VERSIONS;

export const CURRENT_SCHEMA_VERSION = 3;

/**
 * Values optional fields take when a record predates them or never set them
 */
export const FIELD_DEFAULTS = {
  disposition: null,
  disposition_confidence: null,
  sentiment: null,
  urgency: null,
  follow_up_timing: null,
  name: null,
  company: null,
  email: null,
  last_reply_analysis: null,
  meeting_scheduled: false,
  meeting_status: null,
} as const satisfies Omit<QualificationFields, (typeof REQUIRED_FIELDS)[number] | 'extensions'>;

const score = z.number().int().min(0).max(100);

const fieldShape = {
  priority: z.enum(PRIORITIES),
  lead_score: score,
  reasoning: z.string(),
  next_action: z.string().min(1),
  disposition: z.enum(DISPOSITIONS).nullable(),
  disposition_confidence: score.nullable(),
  sentiment: z.enum(SENTIMENTS).nullable(),
  urgency: z.enum(URGENCIES).nullable(),
  follow_up_timing: z.enum(FOLLOW_UP_TIMINGS).nullable(),
  name: z.string().nullable(),
  company: z.string().nullable(),
  email: z.string().nullable(),
  last_reply_analysis: z.string().nullable(),
  meeting_scheduled: z.boolean(),
  meeting_status: z.string().nullable(),
  extensions: z.record(z.unknown()),
};

const fieldsSchema = z.object(fieldShape);
const updateSchema = fieldsSchema.partial().strict();

/**
 * Shape of a persisted document. Required fields must be valid; optional
 * fields that are absent or unreadable take their registry default.
 */
const storedRecordSchema = z.object({
  lead_id: z.string().min(1),
  priority: fieldShape.priority,
  lead_score: fieldShape.lead_score,
  reasoning: fieldShape.reasoning,
  next_action: fieldShape.next_action,
  disposition: fieldShape.disposition.catch(FIELD_DEFAULTS.disposition),
  disposition_confidence: fieldShape.disposition_confidence.catch(FIELD_DEFAULTS.disposition_confidence),
  sentiment: fieldShape.sentiment.catch(FIELD_DEFAULTS.sentiment),
  urgency: fieldShape.urgency.catch(FIELD_DEFAULTS.urgency),
  follow_up_timing: fieldShape.follow_up_timing.catch(FIELD_DEFAULTS.follow_up_timing),
  name: fieldShape.name.catch(FIELD_DEFAULTS.name),
  company: fieldShape.company.catch(FIELD_DEFAULTS.company),
  email: fieldShape.email.catch(FIELD_DEFAULTS.email),
  last_reply_analysis: fieldShape.last_reply_analysis.catch(FIELD_DEFAULTS.last_reply_analysis),
  meeting_scheduled: fieldShape.meeting_scheduled.catch(FIELD_DEFAULTS.meeting_scheduled),
  meeting_status: fieldShape.meeting_status.catch(FIELD_DEFAULTS.meeting_status),
  schema_version: z.number().int().min(1).catch(1),
  created_at: z.string().min(1),
  updated_at: z.string().min(1),
});

const KNOWN_DOCUMENT_KEYS = new Set<string>(Object.keys(storedRecordSchema.shape));

/**
 * Fields a record written with the given schema version reads back with defaults
 */
export function fieldsIntroducedAfter(version: number): RegisteredField[] {
  return Object.entries(FIELD_VERSIONS)
    .filter(([, since]) => since > version)
    .map(([field]) => field)
    .filter(isRegisteredField);
}

function isRegisteredField(field: string): field is RegisteredField {
  return field in FIELD_VERSIONS;
}

function issueFields(error: z.ZodError): string[] {
  const fields = new Set<string>();
  for (const issue of error.issues) {
    if (issue.code === 'unrecognized_keys') {
      issue.keys.forEach((key) => fields.add(key));
    } else {
      fields.add(String(issue.path[0] ?? '(record)'));
    }
  }
  return Array.from(fields);
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`);
}

// ============================================================================
// Store
// ============================================================================

export interface QualificationStoreOptions {
  storage: StorageAdapter;
  logger?: Logger;
  metrics?: Metrics;
  /** Time source for created_at / updated_at */
  clock?: () => Date;
}

export type CreateIfAbsentResult =
  | { created: true; record: QualificationRecord }
  | { created: false; record: QualificationRecord | null };

/**
 * Persistent keyed collection of qualification records
 */
export class QualificationStore {
  private readonly storage: StorageAdapter;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly clock: () => Date;
  private readonly locks = new KeyedLock();

  constructor(options: QualificationStoreOptions) {
    this.storage = options.storage;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Merge field updates into a lead's record, creating it on first write
   *
   * @param leadId - Lead to write
   * @param updates - Fields to set; absent fields keep their stored value
   * @returns The record as persisted
   * @throws ValidationFailedError when creation lacks a required field or a value is invalid
   */
  async upsert(leadId: LeadId, updates: QualificationUpdate): Promise<QualificationRecord> {
    const parsed = this.validateUpdate(leadId, updates);
    return this.locks.run(leadId, () => this.write(leadId, parsed));
  }

  /**
   * Read-modify-write of a lead's record under its lock
   *
   * `compute` sees the record as stored when the write happens; other writes
   * to the same lead in this process wait for it.
   *
   * @param compute - Field updates derived from the current record, or null when none exists
   * @returns The record as persisted
   * @throws ValidationFailedError when the computed updates are invalid
   */
  async update(
    leadId: LeadId,
    compute: (current: QualificationRecord | null) => QualificationUpdate
  ): Promise<QualificationRecord> {
    return this.locks.run(leadId, async () => {
      const updates = compute(await this.get(leadId));
      return this.write(leadId, this.validateUpdate(leadId, updates));
    });
  }

  /**
   * Insert a record only if none exists for the lead
   *
   * @returns created=true with the new record, or created=false with whatever is stored
   */
  async createIfAbsent(leadId: LeadId, fields: QualificationUpdate): Promise<CreateIfAbsentResult> {
    const parsed = this.validateUpdate(leadId, fields);

    return this.locks.run(leadId, async () => {
      const record = this.buildNew(leadId, parsed);
      const saved = await this.storage.saveIfAbsent(QUALIFICATIONS_COLLECTION, leadId, serializeRecord(record));

      if (saved) {
        this.metrics.increment('store.created');
        this.logger.info('Qualification record created', { leadId, priority: record.priority });
        return { created: true, record };
      }

      return { created: false, record: await this.get(leadId) };
    });
  }

  /**
   * Current record for a lead, or null when none exists
   *
   * @throws CorruptRecordError when the stored document has unusable required fields
   */
  async get(leadId: LeadId): Promise<QualificationRecord | null> {
    const stored = await this.storage.load(QUALIFICATIONS_COLLECTION, leadId);
    if (!stored) {
      return null;
    }
    return this.parseDocument(`${QUALIFICATIONS_COLLECTION}/${leadId}`, stored.content);
  }

  /**
   * Every record, most recently updated first
   */
  async listAll(): Promise<QualificationRecord[]> {
    const keys = await this.storage.list(QUALIFICATIONS_COLLECTION);
    const records = await Promise.all(keys.map((key) => this.get(key)));

    return records
      .filter((record): record is QualificationRecord => record !== null)
      .sort((a, b) => {
        if (a.updated_at !== b.updated_at) {
          return a.updated_at < b.updated_at ? 1 : -1;
        }
        return a.lead_id.localeCompare(b.lead_id);
      });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Merge or create; callers hold the lead's lock
   */
  private async write(leadId: LeadId, parsed: QualificationUpdate): Promise<QualificationRecord> {
    const startTime = Date.now();

    // A second pass covers another process creating the record between our read and write
    for (let attempt = 0; attempt < 2; attempt++) {
      const existing = await this.get(leadId);

      if (existing) {
        const record = this.merge(existing, parsed);
        await this.storage.save(QUALIFICATIONS_COLLECTION, leadId, serializeRecord(record));
        this.metrics.timing('store.upsert', Date.now() - startTime, { outcome: 'updated' });
        this.logger.debug('Qualification record updated', {
          leadId,
          fields: Object.keys(parsed),
        });
        return record;
      }

      const record = this.buildNew(leadId, parsed);
      const saved = await this.storage.saveIfAbsent(QUALIFICATIONS_COLLECTION, leadId, serializeRecord(record));
      if (saved) {
        this.metrics.timing('store.upsert', Date.now() - startTime, { outcome: 'created' });
        this.logger.info('Qualification record created', { leadId, priority: record.priority });
        return record;
      }
    }

    throw new CorruptRecordError(`${QUALIFICATIONS_COLLECTION}/${leadId}`, [
      'record exists but could not be read back',
    ]);
  }

  private validateUpdate(leadId: LeadId, updates: QualificationUpdate): QualificationUpdate {
    const result = updateSchema.safeParse(updates);
    if (!result.success) {
      const fields = issueFields(result.error);
      this.metrics.increment('store.validation_failed');
      throw new ValidationFailedError(
        `Invalid qualification update for ${leadId}: ${describeIssues(result.error).join('; ')}`,
        fields
      );
    }
    return result.data;
  }

  private buildNew(leadId: LeadId, updates: QualificationUpdate): QualificationRecord {
    const missing = REQUIRED_FIELDS.filter((field) => updates[field] === undefined);
    if (missing.length > 0) {
      this.metrics.increment('store.validation_failed');
      throw new ValidationFailedError(
        `Cannot create qualification record for ${leadId}: missing required fields ${missing.join(', ')}`,
        missing
      );
    }

    const now = this.clock().toISOString();
    return this.finalize(leadId, { ...FIELD_DEFAULTS, extensions: {}, ...updates }, now, now);
  }

  private merge(existing: QualificationRecord, updates: QualificationUpdate): QualificationRecord {
    const merged = {
      ...existing,
      ...updates,
      extensions: { ...existing.extensions, ...(updates.extensions ?? {}) },
    };
    return this.finalize(existing.lead_id, merged, existing.created_at, this.laterThan(existing.updated_at));
  }

  /**
   * Validate the full field set and stamp identity and timestamps
   */
  private finalize(leadId: LeadId, fields: unknown, createdAt: string, updatedAt: string): QualificationRecord {
    const result = fieldsSchema.safeParse(fields);
    if (!result.success) {
      throw new ValidationFailedError(
        `Invalid qualification record for ${leadId}: ${describeIssues(result.error).join('; ')}`,
        issueFields(result.error)
      );
    }

    return {
      lead_id: leadId,
      ...result.data,
      schema_version: CURRENT_SCHEMA_VERSION,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }

  /**
   * Now, or one millisecond past the previous write if the clock stalled
   */
  private laterThan(previous: string): string {
    const now = this.clock();
    const previousMs = Date.parse(previous);
    if (Number.isFinite(previousMs) && now.getTime() <= previousMs) {
      return new Date(previousMs + 1).toISOString();
    }
    return now.toISOString();
  }

  private parseDocument(key: string, content: string): QualificationRecord {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error: unknown) {
      throw new CorruptRecordError(key, [error instanceof Error ? error.message : 'invalid JSON']);
    }

    const raw = z.record(z.unknown()).safeParse(document);
    if (!raw.success) {
      throw new CorruptRecordError(key, ['document is not a JSON object']);
    }

    const result = storedRecordSchema.safeParse(raw.data);
    if (!result.success) {
      throw new CorruptRecordError(key, describeIssues(result.error));
    }

    const extensions = Object.fromEntries(
      Object.entries(raw.data).filter(([field]) => !KNOWN_DOCUMENT_KEYS.has(field))
    );

    if (result.data.schema_version < CURRENT_SCHEMA_VERSION) {
      this.logger.debug('Read record from an older field set', {
        key,
        schemaVersion: result.data.schema_version,
        defaulted: fieldsIntroducedAfter(result.data.schema_version),
      });
    }

    return { ...result.data, extensions };
  }
}

/**
 * Flatten a record into its stored document; extension fields sit beside known ones
 */
export function serializeRecord(record: QualificationRecord): string {
  const { extensions, ...known } = record;
  return JSON.stringify({ ...extensions, ...known }, null, 2);
}

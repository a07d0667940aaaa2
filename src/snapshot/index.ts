/**
 * Snapshot Differencer
 *
 * Builds a "before" view of a lead (the fixed unqualified state, from seed
 * attributes only) and an "after" view (current record plus the latest event
 * of each type). Both views are read-only projections; nothing is written.
 */

import type {
  EventPayload,
  InteractionEvent,
  LeadId,
  QualificationRecord,
  SeedAttributes,
} from '../types/index.js';
import type { QualificationStore } from '../store/index.js';
import { latestEventsByType, type InteractionLog } from '../interaction-log/index.js';
import { cleanSeed } from '../identity/index.js';

export const UNQUALIFIED_VIEW = {
  lead_score: 0,
  priority: 'unqualified',
  disposition: 'awaiting_reply',
  next_action: 'Needs qualification',
} as const;

export interface BeforeView {
  lead_id: LeadId;
  name: string | null;
  company: string | null;
  interest: string | null;
  source: string | null;
  lead_score: typeof UNQUALIFIED_VIEW.lead_score;
  priority: typeof UNQUALIFIED_VIEW.priority;
  disposition: typeof UNQUALIFIED_VIEW.disposition;
  next_action: typeof UNQUALIFIED_VIEW.next_action;
}

export interface AfterView extends QualificationRecord {
  /** Latest event of each distinct type, keyed by type */
  latest_events: Record<string, InteractionEvent>;
  /** Latest payloads merged oldest type first, then the record's own fields */
  details: EventPayload;
}

export interface Snapshot {
  before: BeforeView;
  after: AfterView | null;
}

export interface SnapshotDifferencerOptions {
  store: QualificationStore;
  log: InteractionLog;
}

/**
 * Fixed unqualified view of a lead
 */
export function buildBeforeView(leadId: LeadId, seed: SeedAttributes = {}): BeforeView {
  const cleaned = cleanSeed(seed);
  return {
    lead_id: leadId,
    name: cleaned.name ?? null,
    company: cleaned.company ?? null,
    interest: cleaned.interest ?? null,
    source: cleaned.source ?? null,
    ...UNQUALIFIED_VIEW,
  };
}

/**
 * Current record overlaid on the latest payload of each event type
 */
export function buildAfterView(record: QualificationRecord, events: InteractionEvent[]): AfterView {
  const latest = latestEventsByType(events);
  const ordered = Array.from(latest.values()).sort((a, b) => a.sequence - b.sequence);
  const details: EventPayload = {};
  for (const event of ordered) {
    Object.assign(details, event.payload);
  }

  const { extensions, ...fields } = record;
  Object.assign(details, fields);

  return {
    ...record,
    extensions: { ...extensions },
    latest_events: Object.fromEntries(latest),
    details,
  };
}

/**
 * Seed attributes as recorded when the lead was created
 */
export function seedFromEvents(events: InteractionEvent[]): SeedAttributes {
  const created = events.find((event) => event.event_type === 'lead_created');
  const seed = created?.payload['seed'];
  if (!seed || typeof seed !== 'object' || Array.isArray(seed)) {
    return {};
  }

  const pick = (key: string): string | null => {
    const value: unknown = Reflect.get(seed, key);
    return typeof value === 'string' ? value : null;
  };
  return {
    name: pick('name'),
    company: pick('company'),
    interest: pick('interest'),
    source: pick('source'),
  };
}

export class SnapshotDifferencer {
  private readonly store: QualificationStore;
  private readonly log: InteractionLog;

  constructor(options: SnapshotDifferencerOptions) {
    this.store = options.store;
    this.log = options.log;
  }

  /**
   * Before/after views of a lead
   *
   * @param leadId - Lead to project
   * @param seed - Seed attributes to use instead of those in the lead_created event
   * @returns null when the lead has neither a record nor any events
   */
  async beforeAfter(leadId: LeadId, seed?: SeedAttributes): Promise<Snapshot | null> {
    const [record, events] = await Promise.all([this.store.get(leadId), this.log.history(leadId)]);

    if (!record && events.length === 0) {
      return null;
    }

    return {
      before: buildBeforeView(leadId, seed ?? seedFromEvents(events)),
      after: record ? buildAfterView(record, events) : null,
    };
  }
}

/**
 * Identity Resolver Module
 *
 * Responsibilities:
 * - Normalize external contact addresses
 * - Derive deterministic lead ids using SHA-256
 * - Create the initial record for a first-seen address exactly once
 *
 * Algorithm:
 * 1. Trim and lower-case the address
 * 2. Hash using SHA-256
 * 3. Prefix the first 16 hex characters with "lead_"
 *
 * Because the id is a pure function of the address, every process agrees on
 * it; uniqueness of the record itself comes from the store's create-if-absent
 * write.
 *
 * Usage:
 * const resolver = new IdentityResolver({ store, log });
 * const leadId = await resolver.resolveOrCreate('Jane@Example.com', { name: 'Jane' });
 */

import { createHash } from 'crypto';
import type { LeadId, QualificationUpdate, SeedAttributes } from '../types/index.js';
import type { QualificationStore } from '../store/index.js';
import type { InteractionLog } from '../interaction-log/index.js';
import { KeyedLock } from '../concurrency/index.js';
import { IdentityConflictError, ValidationFailedError } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';

/**
 * Required fields every newly seen lead starts with
 */
export const INITIAL_RECORD_DEFAULTS = {
  priority: 'medium',
  lead_score: 50,
  reasoning: 'initial contact',
  next_action: 'pending',
} as const satisfies QualificationUpdate;

/**
 * Normalize an external address for identity purposes
 *
 * @throws ValidationFailedError for an empty or whitespace-only address
 */
export function normalizeAddress(address: string): string {
  const normalized = typeof address === 'string' ? address.trim().toLowerCase() : '';
  if (!normalized) {
    throw new ValidationFailedError('External address must not be empty', ['external_address']);
  }
  return normalized;
}

/**
 * Generate the deterministic lead id for an address
 *
 * @param address - External contact address, normalized or not
 * @returns Lead id prefixed with "lead_"
 */
export function deriveLeadId(address: string): LeadId {
  const hash = createHash('sha256').update(normalizeAddress(address)).digest('hex');
  return `lead_${hash.substring(0, 16)}`;
}

function trimmedOrNull(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Seed attributes with blanks dropped, as stored in the lead_created event
 */
export function cleanSeed(seed: SeedAttributes = {}): SeedAttributes {
  const cleaned: SeedAttributes = {};
  const name = trimmedOrNull(seed.name);
  const company = trimmedOrNull(seed.company);
  const interest = trimmedOrNull(seed.interest);
  const source = trimmedOrNull(seed.source);
  if (name) cleaned.name = name;
  if (company) cleaned.company = company;
  if (interest) cleaned.interest = interest;
  if (source) cleaned.source = source;
  return cleaned;
}

export interface IdentityResolverOptions {
  store: QualificationStore;
  log: InteractionLog;
  logger?: Logger;
  metrics?: Metrics;
}

export class IdentityResolver {
  private readonly store: QualificationStore;
  private readonly log: InteractionLog;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly locks = new KeyedLock();

  constructor(options: IdentityResolverOptions) {
    this.store = options.store;
    this.log = options.log;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Lead id for an address, creating the lead on first sight
   *
   * An existing lead is returned untouched; seed attributes only apply at creation.
   *
   * @param externalAddress - Contact address (email or similar)
   * @param seed - Attributes known about the contact at intake
   */
  async resolveOrCreate(externalAddress: string, seed: SeedAttributes = {}): Promise<LeadId> {
    const address = normalizeAddress(externalAddress);
    const leadId = deriveLeadId(address);

    return this.locks.run(address, async () => {
      if (await this.store.get(leadId)) {
        this.metrics.increment('identity.resolved', { outcome: 'existing' });
        return leadId;
      }

      const cleaned = cleanSeed(seed);
      const result = await this.store.createIfAbsent(leadId, {
        ...INITIAL_RECORD_DEFAULTS,
        name: cleaned.name ?? null,
        company: cleaned.company ?? null,
        email: address,
      });

      if (!result.created) {
        if (!result.record) {
          throw new IdentityConflictError(address, leadId);
        }
        // Another process created it between our read and insert
        this.metrics.increment('identity.resolved', { outcome: 'existing' });
        return leadId;
      }

      // The record exists by now; a failed creation event is reported, not raised
      try {
        await this.log.append(leadId, 'lead_created', {
          external_address: address,
          seed: { ...cleaned },
        });
      } catch (error: unknown) {
        this.metrics.increment('identity.creation_event_failed');
        this.logger.warn('Lead created without a lead_created event', {
          leadId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      this.metrics.increment('identity.resolved', { outcome: 'created' });
      this.logger.info('Lead created', { leadId, hasName: Boolean(cleaned.name) });
      return leadId;
    });
  }

  /**
   * Lead id for an address if the lead exists, without creating it
   */
  async lookup(externalAddress: string): Promise<LeadId | null> {
    const leadId = deriveLeadId(externalAddress);
    return (await this.store.get(leadId)) ? leadId : null;
  }
}

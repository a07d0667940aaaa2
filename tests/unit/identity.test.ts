/**
 * Unit tests for the Identity Resolver
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { createHash } from 'crypto';
import { MemoryStorageAdapter } from '../../src/storage/index.js';
import { QualificationStore } from '../../src/store/index.js';
import { InteractionLog } from '../../src/interaction-log/index.js';
import {
  IdentityResolver,
  normalizeAddress,
  deriveLeadId,
  cleanSeed,
} from '../../src/identity/index.js';
import { ValidationFailedError } from '../../src/errors/index.js';
import { silentLogger } from '../../src/logging/index.js';

describe('Identity Resolver', () => {
  let storage: MemoryStorageAdapter;
  let store: QualificationStore;
  let log: InteractionLog;
  let resolver: IdentityResolver;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
    store = new QualificationStore({ storage, logger: silentLogger });
    log = new InteractionLog({ storage, logger: silentLogger });
    resolver = new IdentityResolver({ store, log, logger: silentLogger });
  });

  describe('normalizeAddress()', () => {
    test('should trim and lower-case', () => {
      expect(normalizeAddress('  Jane.Doe@Example.COM ')).toBe('jane.doe@example.com');
    });

    test('should reject empty addresses', () => {
      expect(() => normalizeAddress('   ')).toThrow(ValidationFailedError);
    });
  });

  describe('deriveLeadId()', () => {
    test('should prefix the first 16 hex characters of the SHA-256', () => {
      const expected = `lead_${createHash('sha256').update('jane@example.com').digest('hex').substring(0, 16)}`;

      expect(deriveLeadId('jane@example.com')).toBe(expected);
      expect(deriveLeadId('jane@example.com')).toMatch(/^lead_[a-f0-9]{16}$/);
    });

    test('should ignore casing and surrounding whitespace', () => {
      expect(deriveLeadId(' JANE@example.com')).toBe(deriveLeadId('jane@example.com'));
    });
  });

  describe('cleanSeed()', () => {
    test('should drop blank attributes and trim the rest', () => {
      expect(cleanSeed({ name: ' Jane ', company: '', interest: null, source: 'web form' })).toEqual({
        name: 'Jane',
        source: 'web form',
      });
    });
  });

  describe('resolveOrCreate()', () => {
    test('should create the initial record from seed and defaults', async () => {
      const leadId = await resolver.resolveOrCreate('Jane@Example.com', { name: 'Jane', company: 'Acme' });

      const record = await store.get(leadId);

      expect(record).toMatchObject({
        lead_id: leadId,
        priority: 'medium',
        lead_score: 50,
        reasoning: 'initial contact',
        next_action: 'pending',
        name: 'Jane',
        company: 'Acme',
        email: 'jane@example.com',
      });
    });

    test('should append a lead_created event with the address and seed', async () => {
      const leadId = await resolver.resolveOrCreate('jane@example.com', { name: 'Jane', interest: 'pricing' });

      const history = await log.history(leadId);

      expect(history).toHaveLength(1);
      expect(history[0]?.event_type).toBe('lead_created');
      expect(history[0]?.payload).toEqual({
        external_address: 'jane@example.com',
        seed: { name: 'Jane', interest: 'pricing' },
      });
    });

    test('should return the same id regardless of casing and not overwrite', async () => {
      const first = await resolver.resolveOrCreate('Jane@Example.com', { name: 'Jane' });
      const second = await resolver.resolveOrCreate('jane@example.com', { name: 'Someone Else' });

      expect(second).toBe(first);
      expect((await store.get(first))?.name).toBe('Jane');
      expect(await log.history(first)).toHaveLength(1);
    });

    test('should create exactly one lead under concurrent first sight', async () => {
      const ids = await Promise.all([
        resolver.resolveOrCreate('new@example.com', { name: 'A' }),
        resolver.resolveOrCreate('NEW@example.com', { name: 'B' }),
        resolver.resolveOrCreate(' new@example.com', { name: 'C' }),
      ]);

      expect(new Set(ids).size).toBe(1);
      expect(await store.listAll()).toHaveLength(1);
      expect(await log.history(ids[0] ?? '')).toHaveLength(1);
    });

    test('should create exactly one lead across resolvers sharing a substrate', async () => {
      const otherResolver = new IdentityResolver({
        store: new QualificationStore({ storage, logger: silentLogger }),
        log: new InteractionLog({ storage, logger: silentLogger }),
        logger: silentLogger,
      });

      const [a, b] = await Promise.all([
        resolver.resolveOrCreate('shared@example.com', { name: 'First' }),
        otherResolver.resolveOrCreate('shared@example.com', { name: 'Second' }),
      ]);

      expect(a).toBe(b);
      expect(await store.listAll()).toHaveLength(1);
      expect(await log.history(a)).toHaveLength(1);
    });

    test('should keep a created lead when its creation event cannot be written', async () => {
      const warnings: string[] = [];
      const brokenLog = new InteractionLog({
        storage: {
          save: (c, k, v) => storage.save(c, k, v),
          saveIfAbsent: async () => {
            throw new Error('disk full');
          },
          load: (c, k) => storage.load(c, k),
          exists: (c, k) => storage.exists(c, k),
          list: (c, p) => storage.list(c, p),
        },
        logger: silentLogger,
      });
      const flaky = new IdentityResolver({
        store,
        log: brokenLog,
        logger: { ...silentLogger, warn: (message) => warnings.push(message) },
      });

      const leadId = await flaky.resolveOrCreate('jane@example.com', { name: 'Jane' });

      expect((await store.get(leadId))?.name).toBe('Jane');
      expect(await log.history(leadId)).toEqual([]);
      expect(warnings).toEqual(['Lead created without a lead_created event']);
    });

    test('should reject an empty address', async () => {
      await expect(resolver.resolveOrCreate('  ', {})).rejects.toMatchObject({
        code: 'VALIDATION_FAILED',
        fields: ['external_address'],
      });
    });
  });

  describe('lookup()', () => {
    test('should find existing leads without creating new ones', async () => {
      const leadId = await resolver.resolveOrCreate('jane@example.com');

      expect(await resolver.lookup('JANE@example.com')).toBe(leadId);
      expect(await resolver.lookup('nobody@example.com')).toBeNull();
      expect(await store.listAll()).toHaveLength(1);
    });
  });
});

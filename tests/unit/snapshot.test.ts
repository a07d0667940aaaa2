/**
 * Unit tests for the Snapshot Differencer
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { MemoryStorageAdapter } from '../../src/storage/index.js';
import { QualificationStore } from '../../src/store/index.js';
import { InteractionLog } from '../../src/interaction-log/index.js';
import { IdentityResolver } from '../../src/identity/index.js';
import {
  SnapshotDifferencer,
  buildBeforeView,
  seedFromEvents,
} from '../../src/snapshot/index.js';
import { silentLogger } from '../../src/logging/index.js';

describe('Snapshot Differencer', () => {
  let storage: MemoryStorageAdapter;
  let store: QualificationStore;
  let log: InteractionLog;
  let resolver: IdentityResolver;
  let snapshots: SnapshotDifferencer;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
    store = new QualificationStore({ storage, logger: silentLogger });
    log = new InteractionLog({ storage, logger: silentLogger });
    resolver = new IdentityResolver({ store, log, logger: silentLogger });
    snapshots = new SnapshotDifferencer({ store, log });
  });

  describe('buildBeforeView()', () => {
    test('should build the fixed unqualified view from seed attributes', () => {
      expect(buildBeforeView('lead_0001', { name: 'Jane', company: 'Acme', interest: 'pricing' })).toEqual({
        lead_id: 'lead_0001',
        name: 'Jane',
        company: 'Acme',
        interest: 'pricing',
        source: null,
        lead_score: 0,
        priority: 'unqualified',
        disposition: 'awaiting_reply',
        next_action: 'Needs qualification',
      });
    });
  });

  describe('seedFromEvents()', () => {
    test('should return an empty seed without a lead_created event', () => {
      expect(seedFromEvents([])).toEqual({});
    });
  });

  describe('beforeAfter()', () => {
    test('should return null for an unknown lead', async () => {
      expect(await snapshots.beforeAfter('lead_unknown')).toBeNull();
    });

    test('should take before from the seed even after the record changes', async () => {
      const leadId = await resolver.resolveOrCreate('jane@example.com', { name: 'Jane', company: 'Acme' });
      await store.upsert(leadId, { name: 'Jane Doe', company: 'Acme Corp', priority: 'high', lead_score: 92 });

      const snapshot = await snapshots.beforeAfter(leadId);

      expect(snapshot?.before).toMatchObject({
        name: 'Jane',
        company: 'Acme',
        lead_score: 0,
        priority: 'unqualified',
      });
      expect(snapshot?.after).toMatchObject({
        name: 'Jane Doe',
        company: 'Acme Corp',
        priority: 'high',
        lead_score: 92,
      });
    });

    test('should prefer caller-supplied seed attributes', async () => {
      const leadId = await resolver.resolveOrCreate('jane@example.com', { name: 'Jane' });

      const snapshot = await snapshots.beforeAfter(leadId, { name: 'From Intake Form' });

      expect(snapshot?.before.name).toBe('From Intake Form');
    });

    test('should merge the latest payload of each event type under the record fields', async () => {
      const leadId = await resolver.resolveOrCreate('jane@example.com', { name: 'Jane' });
      await log.append(leadId, 'qualification', { intent: 'first', lead_score: 10 });
      await log.append(leadId, 'reply_analyzed', { intent: 'interested', follow_up: 'soon' });
      await log.append(leadId, 'qualification', { intent: 'second', lead_score: 20 });
      await store.upsert(leadId, { lead_score: 77 });

      const snapshot = await snapshots.beforeAfter(leadId);
      const after = snapshot?.after;

      expect(Object.keys(after?.latest_events ?? {}).sort()).toEqual([
        'lead_created',
        'qualification',
        'reply_analyzed',
      ]);
      expect(after?.latest_events['qualification']?.payload).toEqual({ intent: 'second', lead_score: 20 });
      // qualification (sequence 4) is newer than reply_analyzed (sequence 3)
      expect(after?.details['intent']).toBe('second');
      expect(after?.details['follow_up']).toBe('soon');
      // record fields win over event payloads
      expect(after?.details['lead_score']).toBe(77);
    });

    test('should not write anything', async () => {
      const leadId = await resolver.resolveOrCreate('jane@example.com', { name: 'Jane' });
      const keysBefore = storage.keys();

      await snapshots.beforeAfter(leadId);

      expect(storage.keys()).toEqual(keysBefore);
    });

    test('should return a before view with no after view for events without a record', async () => {
      await log.append('lead_orphan', 'lead_created', { external_address: 'x@example.com', seed: { name: 'X' } });

      const snapshot = await snapshots.beforeAfter('lead_orphan');

      expect(snapshot?.before.name).toBe('X');
      expect(snapshot?.after).toBeNull();
    });
  });
});

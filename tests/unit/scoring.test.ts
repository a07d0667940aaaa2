/**
 * Unit tests for the Derivation Engine
 */

import { describe, test, expect } from '@jest/globals';
import {
  scoreLead,
  computeLeadScore,
  determinePriority,
  normalizeConfidence,
  applyBookingOutcome,
  SCORING_VERSION,
  type ScoringInput,
} from '../../src/scoring/index.js';
import { DISPOSITIONS, SENTIMENTS, URGENCIES } from '../../src/types/index.js';

function input(overrides: Partial<ScoringInput> = {}): ScoringInput {
  return {
    disposition: 'maybe',
    sentiment: 'neutral',
    urgency: 'not_specified',
    confidence: 50,
    ...overrides,
  };
}

describe('Derivation Engine', () => {
  describe('scoreLead()', () => {
    test('should score an engaged, confident, positive, urgent lead at the cap', () => {
      const result = scoreLead(
        input({ disposition: 'engaged', confidence: 95, sentiment: 'positive', urgency: 'high' })
      );

      // 95 × 1.0 + 10 + 5 = 110 → 100
      expect(result.lead_score).toBe(100);
      expect(result.priority).toBe('high');
      expect(result.priority_rule).toBe('engaged_with_strong_signal');
      expect(result.breakdown.unclamped).toBe(110);
      expect(result.reasons).toEqual([
        'Confidence 95 × 1.0 (engaged)',
        'Sentiment positive (+10)',
        'Urgency high (+5)',
        'Clamped 110 to 100',
        'Priority high (engaged_with_strong_signal)',
      ]);
      expect(result.scoring_version).toBe(SCORING_VERSION);
    });

    test('should score a disinterested low-confidence lead low', () => {
      const result = scoreLead(input({ disposition: 'disinterested', confidence: 20 }));

      // 20 × 0.4 = 8
      expect(result.lead_score).toBe(8);
      expect(result.priority).toBe('low');
      expect(result.priority_rule).toBe('disinterested_or_low_confidence');
    });

    test('should round to the nearest integer', () => {
      // 53 × 0.6 = 31.8 → 32
      expect(computeLeadScore(input({ disposition: 'unset', confidence: 53 }))).toBe(32);
      // 45 × 0.8 - 15 = 21
      expect(computeLeadScore(input({ confidence: 45, sentiment: 'negative' }))).toBe(21);
    });

    test('should clamp at zero', () => {
      const result = scoreLead(
        input({ disposition: 'disinterested', confidence: 10, sentiment: 'negative', urgency: 'low' })
      );

      // 4 - 15 - 5 = -16 → 0
      expect(result.lead_score).toBe(0);
      expect(result.reasons).toContain('Clamped -16 to 0');
    });

    test('should treat non-finite confidence as 50', () => {
      expect(normalizeConfidence(Number.NaN)).toBe(50);
      expect(computeLeadScore(input({ disposition: 'engaged', confidence: Number.NaN }))).toBe(50);
    });

    test('should clamp confidence before scoring', () => {
      expect(normalizeConfidence(150)).toBe(100);
      expect(normalizeConfidence(-20)).toBe(0);
      expect(computeLeadScore(input({ disposition: 'engaged', confidence: 150 }))).toBe(100);
    });

    test('should stay within 0-100 and be deterministic for every combination', () => {
      for (const disposition of DISPOSITIONS) {
        for (const sentiment of SENTIMENTS) {
          for (const urgency of URGENCIES) {
            for (const confidence of [0, 29, 30, 79, 80, 100]) {
              const args = { disposition, sentiment, urgency, confidence };
              const first = scoreLead(args);
              expect(first.lead_score).toBeGreaterThanOrEqual(0);
              expect(first.lead_score).toBeLessThanOrEqual(100);
              expect(Number.isInteger(first.lead_score)).toBe(true);
              expect(scoreLead(args)).toEqual(first);
            }
          }
        }
      }
    });
  });

  describe('determinePriority()', () => {
    test('should give high to engaged leads with high urgency even at low confidence', () => {
      expect(determinePriority(input({ disposition: 'engaged', confidence: 60, urgency: 'high' }))).toBe('high');
    });

    test('should give high to engaged leads at confidence 80', () => {
      expect(determinePriority(input({ disposition: 'engaged', confidence: 80 }))).toBe('high');
    });

    test('should prefer the high rule over the low-confidence rule', () => {
      expect(determinePriority(input({ disposition: 'engaged', confidence: 10, urgency: 'high' }))).toBe('high');
    });

    test('should give low below confidence 30', () => {
      expect(determinePriority(input({ disposition: 'maybe', confidence: 29 }))).toBe('low');
    });

    test('should give medium otherwise', () => {
      expect(determinePriority(input({ disposition: 'maybe', confidence: 30 }))).toBe('medium');
      expect(determinePriority(input({ disposition: 'engaged', confidence: 79 }))).toBe('medium');
    });
  });

  describe('applyBookingOutcome()', () => {
    test('should raise score and priority on a confirmed meeting', () => {
      expect(applyBookingOutcome(72, true)).toEqual({
        lead_score: 82,
        priority: 'high',
        next_action: 'follow_up',
        reasoning: 'Meeting successfully booked. Increased lead score and priority.',
      });
    });

    test('should cap the raised score at 100', () => {
      expect(applyBookingOutcome(95, true).lead_score).toBe(100);
    });

    test('should lower score on an unconfirmed meeting', () => {
      const outcome = applyBookingOutcome(3, false);

      expect(outcome.lead_score).toBe(0);
      expect(outcome.priority).toBe('medium');
      expect(outcome.next_action).toBe('nurture');
    });
  });
});

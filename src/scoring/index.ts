/**
 * Derivation Engine
 *
 * Pure functions turning a parsed assessment into a lead score (0-100) and a
 * priority tier. Identical inputs always yield identical outputs, so a stored
 * score can be re-derived from the audit trail.
 *
 * Score:
 *   confidence × disposition multiplier + sentiment adjustment + urgency adjustment,
 *   rounded and clamped to [0, 100]
 *
 * Priority (first match wins):
 *   1. engaged AND (confidence >= 80 OR urgency = high) → high
 *   2. disinterested OR confidence < 30                → low
 *   3. otherwise                                        → medium
 */

import type { Disposition, Priority, Sentiment, Urgency } from '../types/index.js';

export const SCORING_VERSION = 'v1';

// ============================================================================
// SCORING RULES
// ============================================================================

const DISPOSITION_MULTIPLIERS: Record<Disposition, number> = {
  engaged: 1.0,
  maybe: 0.8,
  disinterested: 0.4,
  unset: 0.6,
};

const SENTIMENT_ADJUSTMENTS: Record<Sentiment, number> = {
  positive: 10,
  neutral: 0,
  negative: -15,
};

const URGENCY_ADJUSTMENTS: Record<Urgency, number> = {
  high: 5,
  medium: 0,
  low: -5,
  not_specified: 0,
};

const HIGH_PRIORITY_CONFIDENCE = 80;
const LOW_PRIORITY_CONFIDENCE = 30;
const DEFAULT_CONFIDENCE = 50;

// ============================================================================
// TYPES
// ============================================================================

export interface ScoringInput {
  disposition: Disposition;
  sentiment: Sentiment;
  urgency: Urgency;
  /** 0-100; out-of-range values are clamped, non-finite ones read as 50 */
  confidence: number;
}

export type PriorityRule = 'engaged_with_strong_signal' | 'disinterested_or_low_confidence' | 'default';

export interface ScoreBreakdown {
  base: number;
  disposition_multiplier: number;
  sentiment_adjustment: number;
  urgency_adjustment: number;
  /** Value before rounding and clamping */
  unclamped: number;
}

export interface ScoringResult {
  lead_score: number;
  priority: Priority;
  priority_rule: PriorityRule;
  breakdown: ScoreBreakdown;
  reasons: string[];
  scoring_version: string;
}

// ============================================================================
// MAIN SCORING FUNCTIONS
// ============================================================================

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Confidence as the engine reads it
 */
export function normalizeConfidence(confidence: number): number {
  return Number.isFinite(confidence) ? clamp(confidence, 0, 100) : DEFAULT_CONFIDENCE;
}

/**
 * Lead score for an assessment
 */
export function computeLeadScore(input: ScoringInput): number {
  return scoreLead(input).lead_score;
}

/**
 * Priority tier for an assessment
 */
export function determinePriority(input: ScoringInput): Priority {
  return matchPriorityRule(input)[0];
}

function matchPriorityRule(input: ScoringInput): [Priority, PriorityRule] {
  const confidence = normalizeConfidence(input.confidence);

  if (input.disposition === 'engaged' && (confidence >= HIGH_PRIORITY_CONFIDENCE || input.urgency === 'high')) {
    return ['high', 'engaged_with_strong_signal'];
  }
  if (input.disposition === 'disinterested' || confidence < LOW_PRIORITY_CONFIDENCE) {
    return ['low', 'disinterested_or_low_confidence'];
  }
  return ['medium', 'default'];
}

/**
 * Score a lead and explain how the number came about
 */
export function scoreLead(input: ScoringInput): ScoringResult {
  const base = normalizeConfidence(input.confidence);
  const multiplier = DISPOSITION_MULTIPLIERS[input.disposition];
  const sentimentAdjustment = SENTIMENT_ADJUSTMENTS[input.sentiment];
  const urgencyAdjustment = URGENCY_ADJUSTMENTS[input.urgency];

  const unclamped = base * multiplier + sentimentAdjustment + urgencyAdjustment;
  const leadScore = clamp(Math.round(unclamped), 0, 100);
  const [priority, rule] = matchPriorityRule(input);

  const reasons: string[] = [
    `Confidence ${base} × ${multiplier.toFixed(1)} (${input.disposition})`,
  ];
  if (sentimentAdjustment !== 0) {
    reasons.push(`Sentiment ${input.sentiment} (${formatAdjustment(sentimentAdjustment)})`);
  }
  if (urgencyAdjustment !== 0) {
    reasons.push(`Urgency ${input.urgency} (${formatAdjustment(urgencyAdjustment)})`);
  }
  if (leadScore !== Math.round(unclamped)) {
    reasons.push(`Clamped ${Math.round(unclamped)} to ${leadScore}`);
  }
  reasons.push(`Priority ${priority} (${rule})`);

  return {
    lead_score: leadScore,
    priority,
    priority_rule: rule,
    breakdown: {
      base,
      disposition_multiplier: multiplier,
      sentiment_adjustment: sentimentAdjustment,
      urgency_adjustment: urgencyAdjustment,
      unclamped,
    },
    reasons,
    scoring_version: SCORING_VERSION,
  };
}

function formatAdjustment(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

// ============================================================================
// MEETING OUTCOME
// ============================================================================

export interface BookingOutcome {
  lead_score: number;
  priority: Priority;
  next_action: string;
  reasoning: string;
}

/**
 * Re-score a lead after a booking attempt
 *
 * @param currentScore - Score on record before the attempt
 * @param confirmed - Whether the meeting was confirmed
 */
export function applyBookingOutcome(currentScore: number, confirmed: boolean): BookingOutcome {
  const score = Number.isFinite(currentScore) ? Math.round(currentScore) : DEFAULT_CONFIDENCE;

  if (confirmed) {
    return {
      lead_score: clamp(score + 10, 0, 100),
      priority: 'high',
      next_action: 'follow_up',
      reasoning: 'Meeting successfully booked. Increased lead score and priority.',
    };
  }

  return {
    lead_score: clamp(score - 5, 0, 100),
    priority: 'medium',
    next_action: 'nurture',
    reasoning: 'Booking failed or not confirmed. Lowered lead score and priority.',
  };
}

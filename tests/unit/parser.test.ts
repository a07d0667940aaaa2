/**
 * Unit tests for the Response Parser Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  parseQualificationResponse,
  parseReplyAnalysisResponse,
  parseMeetingRequestResponse,
  normalizeLabel,
  matchEnumValue,
  scanLabeledLines,
  degradedFields,
  QUALIFICATION_FIELDS,
  REPLY_ANALYSIS_FIELDS,
} from '../../src/parser/index.js';

describe('Response Parser Module', () => {
  describe('normalizeLabel()', () => {
    test('should fold spacing, case and separators to one form', () => {
      expect(normalizeLabel('Next Action')).toBe('next_action');
      expect(normalizeLabel('next_action')).toBe('next_action');
      expect(normalizeLabel('NEXT-ACTION')).toBe('next_action');
      expect(normalizeLabel('  Follow   Up Timing ')).toBe('follow_up_timing');
    });
  });

  describe('matchEnumValue()', () => {
    const disposition = QUALIFICATION_FIELDS.disposition;

    test('should match values case-insensitively', () => {
      expect(matchEnumValue('ENGAGED', disposition)).toBe('engaged');
    });

    test('should resolve aliases', () => {
      expect(matchEnumValue('Not interested', disposition)).toBe('disinterested');
      expect(matchEnumValue('interested', disposition)).toBe('engaged');
    });

    test('should match by leading token', () => {
      expect(matchEnumValue('High - wants a demo this week', QUALIFICATION_FIELDS.urgency)).toBe('high');
    });

    test('should fold punctuation before comparing', () => {
      expect(matchEnumValue('1 week', REPLY_ANALYSIS_FIELDS.follow_up_timing)).toBe('1-week');
      expect(matchEnumValue('3 Months', REPLY_ANALYSIS_FIELDS.follow_up_timing)).toBe('3-months');
    });

    test('should return null for unknown values', () => {
      expect(matchEnumValue('purple', disposition)).toBeNull();
      expect(matchEnumValue('', disposition)).toBeNull();
    });
  });

  describe('scanLabeledLines()', () => {
    test('should keep the first occurrence of a field', () => {
      const { raw, recognizedLines } = scanLabeledLines(
        'Sentiment: positive\nSentiment: negative',
        QUALIFICATION_FIELDS
      );

      expect(raw.get('sentiment')).toBe('positive');
      expect(recognizedLines).toBe(2);
    });

    test('should append continuation lines to a text field', () => {
      const { raw } = scanLabeledLines(
        'Reasoning: Asked about pricing\nand integration timelines.\n\nTrailing note',
        QUALIFICATION_FIELDS
      );

      expect(raw.get('reasoning')).toBe('Asked about pricing and integration timelines.');
    });

    test('should strip markdown list and bold markers', () => {
      const { raw } = scanLabeledLines('- **Disposition:** engaged\n* Confidence: 80', QUALIFICATION_FIELDS);

      expect(raw.get('disposition')).toBe('engaged');
      expect(raw.get('confidence')).toBe('80');
    });
  });

  describe('parseQualificationResponse()', () => {
    test('should parse a well-formed response', () => {
      const result = parseQualificationResponse(
        [
          'Disposition: engaged',
          'Confidence: 95',
          'Sentiment: positive',
          'Urgency: high',
          'Reasoning: Requested a demo for next week.',
          'Next Action: Send calendar link',
        ].join('\n')
      );

      expect(result.agentType).toBe('qualification');
      expect(result.values).toEqual({
        disposition: 'engaged',
        confidence: 95,
        sentiment: 'positive',
        urgency: 'high',
        reasoning: 'Requested a demo for next week.',
        next_action: 'Send calendar link',
      });
      expect(result.degraded).toEqual([]);
      expect(result.recognizedLines).toBe(6);
      expect(Object.values(result.defaulted).every((d) => d === false)).toBe(true);
    });

    test('should return the full default record for garbage input', () => {
      const result = parseQualificationResponse('garbage input with no labels');

      expect(result.values).toEqual({
        disposition: 'unset',
        confidence: 50,
        sentiment: 'neutral',
        urgency: 'not_specified',
        reasoning: '',
        next_action: 'Manual review required',
      });
      expect(result.recognizedLines).toBe(0);
      expect(Object.values(result.defaulted).every((d) => d === true)).toBe(true);
      expect(degradedFields(result)).toEqual([
        'disposition',
        'confidence',
        'sentiment',
        'urgency',
        'reasoning',
        'next_action',
      ]);
      expect(result.degraded.every((d) => d.reason === 'missing')).toBe(true);
    });

    test('should handle null and empty input', () => {
      expect(parseQualificationResponse(null).values.disposition).toBe('unset');
      expect(parseQualificationResponse('').recognizedLines).toBe(0);
    });

    test('should take the first number of an integer field', () => {
      const result = parseQualificationResponse('Confidence: 87% (fairly sure)');

      expect(result.values.confidence).toBe(87);
      expect(result.defaulted.confidence).toBe(false);
    });

    test('should clamp out-of-range integers and report them as clamped', () => {
      const result = parseQualificationResponse('Confidence: 140');

      expect(result.values.confidence).toBe(100);
      expect(result.defaulted.confidence).toBe(false);
      expect(result.clamped).toEqual(['confidence']);
    });

    test('should clamp numbers too large to represent', () => {
      const digits = '9'.repeat(400);

      const high = parseQualificationResponse(`Confidence: ${digits}`);
      const low = parseQualificationResponse(`Confidence: -${digits}`);

      expect(high.values.confidence).toBe(100);
      expect(high.clamped).toEqual(['confidence']);
      expect(high.degraded.map((d) => d.field)).not.toContain('confidence');
      expect(low.values.confidence).toBe(0);
      expect(low.clamped).toEqual(['confidence']);
    });

    test('should default non-numeric integers', () => {
      const result = parseQualificationResponse('Confidence: very high');

      expect(result.values.confidence).toBe(50);
      expect(result.degraded).toContainEqual({
        field: 'confidence',
        reason: 'not_numeric',
        raw: 'very high',
        fallback: 50,
      });
    });

    test('should default unrecognized enum values', () => {
      const result = parseQualificationResponse('Disposition: lukewarm-ish');

      expect(result.values.disposition).toBe('unset');
      expect(result.degraded).toContainEqual({
        field: 'disposition',
        reason: 'unrecognized_value',
        raw: 'lukewarm-ish',
        fallback: 'unset',
      });
    });

    test('should default empty values', () => {
      const result = parseQualificationResponse('Reasoning:\nNext Action:   ');

      expect(result.values.reasoning).toBe('');
      expect(result.values.next_action).toBe('Manual review required');
      expect(result.degraded.find((d) => d.field === 'next_action')?.reason).toBe('empty_value');
    });

    test('should accept alternate labels', () => {
      const result = parseQualificationResponse('Lead Disposition: maybe\nDisposition Confidence: 40');

      expect(result.values.disposition).toBe('maybe');
      expect(result.values.confidence).toBe(40);
    });
  });

  describe('parseReplyAnalysisResponse()', () => {
    test('should parse intent and follow-up timing', () => {
      const result = parseReplyAnalysisResponse(
        [
          'INTENT: meeting_request',
          'DISPOSITION: engaged',
          'CONFIDENCE: 85',
          'SENTIMENT: positive',
          'URGENCY: medium',
          'FOLLOW_UP_TIMING: immediate',
          'REASONING: Proposed two times for a call.',
          'NEXT_ACTION: Confirm a slot',
        ].join('\n')
      );

      expect(result.agentType).toBe('reply_analysis');
      expect(result.values.intent).toBe('meeting_request');
      expect(result.values.follow_up_timing).toBe('immediate');
      expect(result.values.next_action).toBe('Confirm a slot');
      expect(result.degraded).toEqual([]);
    });

    test('should use reply defaults when fields are missing', () => {
      const result = parseReplyAnalysisResponse('Sentiment: negative');

      expect(result.values.sentiment).toBe('negative');
      expect(result.values.intent).toBe('neutral');
      expect(result.values.follow_up_timing).toBe('1-week');
      expect(result.values.next_action).toBe('Follow up via email');
    });
  });

  describe('parseMeetingRequestResponse()', () => {
    test('should parse a meeting request', () => {
      const result = parseMeetingRequestResponse(
        [
          'Meeting Intent: schedule_meeting',
          'Meeting Type: demo',
          'Urgency: high',
          'Preferred Time: Tuesday afternoon',
          'Duration: 45 minutes',
          'Suggested Datetime: 2026-03-10T14:00:00Z',
          'Booking Action: book',
          'Analysis: Wants a product demo.',
          'Recommended Response: Offer Tuesday 2pm.',
        ].join('\n')
      );

      expect(result.values).toEqual({
        meeting_intent: 'schedule_meeting',
        meeting_type: 'demo',
        urgency: 'high',
        preferred_time: 'Tuesday afternoon',
        duration: 45,
        analysis: 'Wants a product demo.',
        recommended_response: 'Offer Tuesday 2pm.',
        booking_action: 'book',
        suggested_datetime: '2026-03-10T14:00:00Z',
      });
      expect(result.degraded).toEqual([]);
    });

    test('should clamp duration into 15-240 minutes', () => {
      expect(parseMeetingRequestResponse('Duration: 5').values.duration).toBe(15);
      expect(parseMeetingRequestResponse('Duration: 600').values.duration).toBe(240);
    });

    test('should treat an unparseable datetime as unrecognized', () => {
      const result = parseMeetingRequestResponse('Suggested Datetime: sometime soon');

      expect(result.values.suggested_datetime).toBe('');
      expect(result.degraded).toContainEqual({
        field: 'suggested_datetime',
        reason: 'unrecognized_value',
        raw: 'sometime soon',
        fallback: '',
      });
    });

    test('should default to an inquiry with no booking', () => {
      const result = parseMeetingRequestResponse('nothing useful');

      expect(result.values.meeting_intent).toBe('inquiry');
      expect(result.values.meeting_type).toBe('consultation');
      expect(result.values.duration).toBe(30);
      expect(result.values.booking_action).toBe('none');
    });
  });
});

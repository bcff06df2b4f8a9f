/**
 * Reply Time Parser Tests
 */

import {
  parseDurationSeconds,
  isDeclineReply,
  findFirstTimeMention,
  formatDuration,
} from '../src';

describe('Reply Time Parser', () => {
  describe('parseDurationSeconds', () => {
    test.each([
      ['10 minutes', 600],
      ['10 min', 600],
      ['10m', 600],
      ['5 more minutes', 300],
      ['I need 20 MINUTES', 1200],
      ['2 hours', 7200],
      ['1.5 hours', 5400],
      ['1 hr', 3600],
      ['30 sec', 30],
      ['45 seconds', 45],
      ['15', 900],
      ['15 more', 900],
      ['10.', 600],
      ['ok, 10.', 600],
      ['1.5', 90],
    ])('parses "%s" as %d seconds', (reply, expected) => {
      expect(parseDurationSeconds(reply)).toBe(expected);
    });

    test.each([
      ['half an hour', 1800],
      ['maybe half hour', 1800],
      ['a quarter of an hour', 900],
      ['an hour', 3600],
      ['a couple of minutes', 120],
      ['a few minutes', 180],
      ['just a bit longer', 120],
      ['a little', 120],
      ['something quick', 60],
    ])('parses colloquial "%s" as %d seconds', (reply, expected) => {
      expect(parseDurationSeconds(reply)).toBe(expected);
    });

    test('first time mention wins', () => {
      expect(parseDurationSeconds('10 minutes, maybe 2 hours')).toBe(600);
      expect(parseDurationSeconds('2 hours or 10 minutes')).toBe(7200);
    });

    test('half an hour is not read as a whole hour', () => {
      expect(findFirstTimeMention('half an hour')).toEqual({
        index: 0,
        phrase: 'half an hour',
        seconds: 1800,
      });
    });

    test('returns null for zero and negative amounts', () => {
      expect(parseDurationSeconds('0 minutes')).toBeNull();
      expect(parseDurationSeconds('0')).toBeNull();
      expect(parseDurationSeconds('-5 minutes')).toBeNull();
    });

    test('returns null for text without a duration', () => {
      expect(parseDurationSeconds('ok')).toBeNull();
      expect(parseDurationSeconds('no')).toBeNull();
      expect(parseDurationSeconds("I don't know")).toBeNull();
      expect(parseDurationSeconds('')).toBeNull();
    });
  });

  describe('isDeclineReply', () => {
    test('explicit zero or negative amounts are declines', () => {
      expect(isDeclineReply('0 minutes')).toBe(true);
      expect(isDeclineReply('-5 minutes')).toBe(true);
    });

    test('stop phrases are declines', () => {
      expect(isDeclineReply("I'll stop now")).toBe(true);
      expect(isDeclineReply("I'm done")).toBe(true);
      expect(isDeclineReply('ok I quit')).toBe(true);
    });

    test('vague replies are not declines', () => {
      expect(isDeclineReply('ok')).toBe(false);
      expect(isDeclineReply('no')).toBe(false);
      expect(isDeclineReply("I don't know")).toBe(false);
    });

    test('a positive duration is not a decline', () => {
      expect(isDeclineReply('5 more minutes then I stop')).toBe(false);
    });
  });

  describe('formatDuration', () => {
    test('formats whole hours, minutes and seconds', () => {
      expect(formatDuration(3600)).toBe('1 hour');
      expect(formatDuration(7200)).toBe('2 hours');
      expect(formatDuration(60)).toBe('1 minute');
      expect(formatDuration(600)).toBe('10 minutes');
      expect(formatDuration(5400)).toBe('90 minutes');
      expect(formatDuration(90)).toBe('90 seconds');
      expect(formatDuration(1)).toBe('1 second');
    });
  });
});

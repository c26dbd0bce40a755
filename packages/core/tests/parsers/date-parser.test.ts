import { describe, it, expect } from 'vitest';
import {
  parseDueDate, parseDateInput, formatDueDate, formatTimestamp,
  INVALID_DATE_FORMAT_MESSAGE, NOT_IN_FUTURE_MESSAGE,
} from '../../src/parsers/date-parser.js';
import { createManualClock } from '../../src/types/clock.js';
import type { DataResult } from '../../src/types/results.js';

const clock = createManualClock('2026-10-19T12:00:00.000Z');

/** ISO string of a successful parse, or the failure reason */
function outcome(result: DataResult<Date>): string {
  switch (result.type) {
    case 'success': return result.data.toISOString();
    case 'validation-error': return result.reason;
    default: return result.type;
  }
}

describe('parseDueDate', () => {
  // --- Calendar dates ---

  it('parses yyyy-MM-dd as midnight UTC', () => {
    expect(outcome(parseDueDate('2030-01-01', clock))).toBe('2030-01-01T00:00:00.000Z');
  });

  it('accepts month and day without zero padding', () => {
    expect(outcome(parseDueDate('2030-1-1', clock))).toBe('2030-01-01T00:00:00.000Z');
    expect(outcome(parseDueDate('2030-12-5', clock))).toBe('2030-12-05T00:00:00.000Z');
    expect(outcome(parseDueDate('2030-2-30', clock))).toBe('invalid-date-format');
  });

  it('accepts leap days', () => {
    expect(outcome(parseDueDate('2028-02-29', clock))).toBe('2028-02-29T00:00:00.000Z');
  });

  it('trims surrounding whitespace', () => {
    expect(outcome(parseDueDate('  2030-01-01  ', clock))).toBe('2030-01-01T00:00:00.000Z');
  });

  it('rejects dates that do not exist', () => {
    expect(outcome(parseDueDate('2030-02-30', clock))).toBe('invalid-date-format');
    expect(outcome(parseDueDate('2029-02-29', clock))).toBe('invalid-date-format');
    expect(outcome(parseDueDate('2030-13-01', clock))).toBe('invalid-date-format');
    expect(outcome(parseDueDate('2030-00-10', clock))).toBe('invalid-date-format');
  });

  // --- RFC 3339 timestamps ---

  it('parses UTC timestamps', () => {
    expect(outcome(parseDueDate('2030-01-01T09:30:00Z', clock))).toBe('2030-01-01T09:30:00.000Z');
    expect(outcome(parseDueDate('2030-01-01t09:30:00z', clock))).toBe('2030-01-01T09:30:00.000Z');
  });

  it('applies positive and negative offsets', () => {
    expect(outcome(parseDueDate('2030-01-01T09:30:00+02:00', clock))).toBe('2030-01-01T07:30:00.000Z');
    expect(outcome(parseDueDate('2030-01-01T09:30:00-05:30', clock))).toBe('2030-01-01T15:00:00.000Z');
  });

  it('crosses the date line when the offset requires it', () => {
    expect(outcome(parseDueDate('2030-01-01T01:00:00+03:00', clock))).toBe('2029-12-31T22:00:00.000Z');
  });

  it('keeps fractional seconds to millisecond precision', () => {
    expect(outcome(parseDueDate('2030-01-01T09:30:00.5Z', clock))).toBe('2030-01-01T09:30:00.500Z');
    expect(outcome(parseDueDate('2030-01-01T09:30:00.123456Z', clock))).toBe('2030-01-01T09:30:00.123Z');
  });

  it('accepts a space between date and time', () => {
    expect(outcome(parseDueDate('2030-01-01 09:30:00Z', clock))).toBe('2030-01-01T09:30:00.000Z');
  });

  it('treats a calendar date and its midnight timestamp as the same instant', () => {
    const date = parseDueDate('2099-12-31', clock);
    const stamp = parseDueDate('2099-12-31T00:00:00Z', clock);
    expect(date.type).toBe('success');
    expect(stamp.type).toBe('success');
    expect(outcome(date)).toBe(outcome(stamp));
  });

  it('rejects out-of-range time fields', () => {
    expect(outcome(parseDueDate('2030-01-01T24:00:00Z', clock))).toBe('invalid-date-format');
    expect(outcome(parseDueDate('2030-01-01T10:60:00Z', clock))).toBe('invalid-date-format');
    expect(outcome(parseDueDate('2030-01-01T10:00:60Z', clock))).toBe('invalid-date-format');
    expect(outcome(parseDueDate('2030-01-01T10:00:00+24:00', clock))).toBe('invalid-date-format');
  });

  // --- Rejections ---

  it('rejects unrecognised formats with the format message', () => {
    const result = parseDueDate('not-a-date', clock);
    expect(result).toEqual({
      type: 'validation-error',
      reason: 'invalid-date-format',
      message: INVALID_DATE_FORMAT_MESSAGE,
    });
  });

  it('rejects near misses', () => {
    for (const input of ['2030/01/01', '01-01-2030', '2030-001-01', '2030-01-01T10:00:00', 'tomorrow', '']) {
      expect(outcome(parseDueDate(input, clock))).toBe('invalid-date-format');
    }
  });

  it('rejects dates in the past', () => {
    const result = parseDueDate('2026-10-18', clock);
    expect(result).toEqual({
      type: 'validation-error',
      reason: 'due-date-not-in-future',
      message: NOT_IN_FUTURE_MESSAGE,
    });
  });

  it('rejects the current instant and accepts one second later', () => {
    expect(outcome(parseDueDate('2026-10-19T12:00:00Z', clock))).toBe('due-date-not-in-future');
    expect(outcome(parseDueDate('2026-10-19T12:00:01Z', clock))).toBe('2026-10-19T12:00:01.000Z');
  });

  it('rejects today as a calendar date once midnight has passed', () => {
    expect(outcome(parseDueDate('2026-10-19', clock))).toBe('due-date-not-in-future');
  });
});

describe('parseDateInput', () => {
  it('parses without the future check', () => {
    expect(parseDateInput('2000-01-01')?.toISOString()).toBe('2000-01-01T00:00:00.000Z');
  });

  it('returns null for unknown formats', () => {
    expect(parseDateInput('soon')).toBeNull();
  });
});

describe('formatDueDate', () => {
  it('formats the UTC calendar date', () => {
    expect(formatDueDate('2030-01-01T00:00:00.000Z')).toBe('2030-01-01');
    expect(formatDueDate('2029-12-31T23:59:59.999Z')).toBe('2029-12-31');
  });
});

describe('formatTimestamp', () => {
  it('formats UTC date, hours and minutes', () => {
    expect(formatTimestamp('2026-10-19T08:05:42.000Z')).toBe('2026-10-19 08:05');
  });
});

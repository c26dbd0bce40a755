/**
 * Due-date parsing and formatting.
 * Accepts a calendar date (yyyy-MM-dd, midnight UTC) or an RFC 3339 timestamp
 * with an explicit offset. Every accepted date must lie strictly in the future.
 */

import type { Clock } from '../types/clock.js';
import { systemClock } from '../types/clock.js';
import type { DataResult } from '../types/results.js';
import { validationError } from '../types/results.js';

export const INVALID_DATE_FORMAT_MESSAGE = 'Invalid date format. Please use YYYY-MM-DD or RFC3339 format';
export const NOT_IN_FUTURE_MESSAGE = 'Due date must be in the future';

/** yyyy-M-d, month and day with or without zero padding */
const ISO_DATE_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

/** yyyy-MM-ddTHH:mm:ss[.fff](Z|±HH:mm) */
const RFC3339_RE = /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|([+-])(\d{2}):(\d{2}))$/;

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Epoch millis for a UTC calendar date, or null if the date does not exist (e.g. 2026-02-30) */
function utcDate(year: number, month: number, day: number): number | null {
  // setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d.getTime();
}

function tryParseCalendarDate(input: string): Date | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;

  const ms = utcDate(Number(m[1]), Number(m[2]), Number(m[3]));
  return ms === null ? null : new Date(ms);
}

function tryParseTimestamp(input: string): Date | null {
  const m = RFC3339_RE.exec(input);
  if (!m) return null;

  const [, y, mo, d, h, mi, s, fraction, zone, sign, offH, offM] = m;
  const dayMs = utcDate(Number(y), Number(mo), Number(d));
  if (dayMs === null) return null;

  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = Number(s);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  // Milliseconds precision; extra fraction digits are dropped
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  let offsetMinutes = 0;
  if (zone !== 'Z' && zone !== 'z') {
    const oh = Number(offH);
    const om = Number(offM);
    if (oh > 23 || om > 59) return null;
    offsetMinutes = (sign === '-' ? -1 : 1) * (oh * 60 + om);
  }

  const local = dayMs + ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
  return new Date(local - offsetMinutes * 60_000);
}

/**
 * Parse a due date without the future check.
 * Returns null if the input is in neither accepted format.
 */
export function parseDateInput(input: string): Date | null {
  const trimmed = input.trim();
  return tryParseCalendarDate(trimmed) ?? tryParseTimestamp(trimmed);
}

/**
 * Parse and validate a due date for the write path.
 *
 * @param input - "2030-01-01" or "2030-01-01T09:30:00+02:00"
 * @param clock - Source of "now" for the future check
 */
export function parseDueDate(input: string, clock: Clock = systemClock): DataResult<Date> {
  const date = parseDateInput(input);
  if (!date) {
    return validationError('invalid-date-format', INVALID_DATE_FORMAT_MESSAGE);
  }
  if (date.getTime() <= clock.now().getTime()) {
    return validationError('due-date-not-in-future', NOT_IN_FUTURE_MESSAGE);
  }
  return { type: 'success', data: date, message: `Due ${formatDueDate(date.toISOString())}` };
}

/** Format an ISO instant as yyyy-MM-dd (UTC) */
export function formatDueDate(iso: string): string {
  const d = new Date(iso);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

/** Format an ISO instant as yyyy-MM-dd HH:mm (UTC) */
export function formatTimestamp(iso: string): string {
  const d = new Date(iso);
  return `${formatDueDate(iso)} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`;
}

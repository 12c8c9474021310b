import { DateFormatUnrecognizedError } from '../errors.js';

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  offsetMinutes: number;
}

const MONTH_ABBREVIATIONS = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun',
  'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
] as const;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

const RFC1123_PATTERN =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+(GMT|UTC|Z|[+-]\d{4})$/i;

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffset(zone: string | undefined): number {
  if (zone === undefined) return 0;
  const upper = zone.toUpperCase();
  if (upper === 'Z' || upper === 'GMT' || upper === 'UTC') return 0;

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function matchIso(value: string): DateParts | null {
  const m = ISO_PATTERN.exec(value);
  if (m === null) return null;
  const fraction = (m[7] ?? '').padEnd(3, '0').slice(0, 3);
  return {
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4] ?? 0),
    minute: Number(m[5] ?? 0),
    second: Number(m[6] ?? 0),
    millisecond: Number(fraction),
    offsetMinutes: parseOffset(m[8]),
  };
}

function matchRfc1123(value: string): DateParts | null {
  const m = RFC1123_PATTERN.exec(value);
  if (m === null) return null;
  const monthIndex = MONTH_ABBREVIATIONS.findIndex((abbr) => abbr === (m[2] ?? '').toLowerCase());
  if (monthIndex < 0) return null;
  return {
    year: Number(m[3]),
    month: monthIndex + 1,
    day: Number(m[1]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6] ?? 0),
    millisecond: 0,
    offsetMinutes: parseOffset(m[7]),
  };
}

function isValidParts(p: DateParts): boolean {
  return (
    p.month >= 1 &&
    p.month <= 12 &&
    p.day >= 1 &&
    p.day <= daysInMonth(p.year, p.month) &&
    p.hour < 24 &&
    p.minute < 60 &&
    p.second < 60
  );
}

/**
 * Parse an export timestamp into ISO-8601 UTC (`2025-07-03T10:15:00.000Z`).
 *
 * Accepted forms: ISO-8601 with or without a zone designator, the
 * `YYYY-MM-DD HH:mm[:ss]` form processor exports use, a bare date, and
 * RFC-1123 (`Thu, 03 Jul 2025 10:15:00 GMT`). Values without a zone are UTC.
 */
export function parseTimestamp(value: string): string {
  const trimmed = value.trim();
  const parts = matchIso(trimmed) ?? matchRfc1123(trimmed);

  if (parts === null || !isValidParts(parts)) {
    throw new DateFormatUnrecognizedError(value);
  }

  const utcMs =
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second, parts.millisecond) -
    parts.offsetMinutes * 60_000;

  return new Date(utcMs).toISOString();
}

/** Blank cells read as null. */
export function parseOptionalTimestamp(value: string): string | null {
  return value.trim() === '' ? null : parseTimestamp(value);
}

export function toIsoDate(timestamp: string): string {
  return timestamp.slice(0, 10);
}

export function compareTimestamps(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

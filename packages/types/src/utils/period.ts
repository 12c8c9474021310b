import { ConfigError } from '../errors.js';
import type { DateRange, Period } from '../types/index.js';
import { daysInMonth, toIsoDate } from './date.js';

const PERIOD_PATTERN = /^(\d{4})-(\d{1,2})$/;

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export function isValidPeriod(period: Period): boolean {
  return (
    Number.isInteger(period.year) &&
    Number.isInteger(period.month) &&
    period.year >= 1970 &&
    period.year <= 9999 &&
    period.month >= 1 &&
    period.month <= 12
  );
}

export function makePeriod(year: number, month: number): Period {
  const period = { year, month };
  if (!isValidPeriod(period)) {
    throw new ConfigError(`Invalid period: year=${year}, month=${month}`);
  }
  return period;
}

/** `2025-07` */
export function formatPeriod(period: Period): string {
  return `${period.year}-${String(period.month).padStart(2, '0')}`;
}

export function parsePeriod(value: string): Period {
  const m = PERIOD_PATTERN.exec(value.trim());
  if (m === null) {
    throw new ConfigError(`Invalid period "${value}": expected YYYY-MM`);
  }
  return makePeriod(Number(m[1]), Number(m[2]));
}

export function periodOfTimestamp(timestamp: string): Period {
  return parsePeriod(timestamp.slice(0, 7));
}

export function previousPeriod(period: Period): Period {
  return period.month === 1
    ? { year: period.year - 1, month: 12 }
    : { year: period.year, month: period.month - 1 };
}

export function nextPeriod(period: Period): Period {
  return period.month === 12
    ? { year: period.year + 1, month: 1 }
    : { year: period.year, month: period.month + 1 };
}

export function comparePeriods(a: Period, b: Period): number {
  return a.year !== b.year ? a.year - b.year : a.month - b.month;
}

export function periodStartDate(period: Period): string {
  return `${formatPeriod(period)}-01`;
}

export function periodEndDate(period: Period): string {
  return `${formatPeriod(period)}-${String(daysInMonth(period.year, period.month)).padStart(2, '0')}`;
}

export function isInPeriod(timestamp: string, period: Period): boolean {
  return timestamp.slice(0, 7) === formatPeriod(period);
}

export function isAfterPeriod(timestamp: string, period: Period): boolean {
  return timestamp.slice(0, 7) > formatPeriod(period);
}

export function isOnOrBeforePeriodEnd(timestamp: string, period: Period): boolean {
  return toIsoDate(timestamp) <= periodEndDate(period);
}

/** `July 2025` */
export function periodLabel(period: Period): string {
  return `${MONTH_NAMES[period.month - 1] ?? String(period.month)} ${period.year}`;
}

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDay(value: string): boolean {
  const m = DAY_PATTERN.exec(value);
  if (m === null) return false;
  const period = { year: Number(m[1]), month: Number(m[2]) };
  const day = Number(m[3]);
  return isValidPeriod(period) && day >= 1 && day <= daysInMonth(period.year, period.month);
}

/** Inclusive range of `YYYY-MM-DD` days. */
export function makeDateRange(from: string, to: string): DateRange {
  for (const value of [from, to]) {
    if (!isCalendarDay(value)) {
      throw new ConfigError(`Invalid date "${value}": expected YYYY-MM-DD`);
    }
  }
  if (from > to) {
    throw new ConfigError(`Invalid date range: ${from} is after ${to}`);
  }
  return { from, to };
}

/** Days `startDay`..`endDay` of a month; the whole month by default. */
export function periodRange(period: Period, startDay = 1, endDay?: number): DateRange {
  const lastDay = daysInMonth(period.year, period.month);
  const end = endDay ?? lastDay;
  if (!Number.isInteger(startDay) || !Number.isInteger(end) || startDay < 1 || end > lastDay || startDay > end) {
    throw new ConfigError(`Invalid day range ${startDay}-${end} for ${formatPeriod(period)}`);
  }
  const day = (n: number): string => `${formatPeriod(period)}-${String(n).padStart(2, '0')}`;
  return { from: day(startDay), to: day(end) };
}

export function isInRange(timestamp: string, range: DateRange): boolean {
  const day = toIsoDate(timestamp);
  return day >= range.from && day <= range.to;
}

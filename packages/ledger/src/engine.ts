import type { Decimal } from 'decimal.js';
import {
  ZERO,
  compareTimestamps,
  comparePeriods,
  formatPeriod,
  nextPeriod,
  periodOfTimestamp,
  type ClassifiedRecord,
  type OpeningBalanceSource,
  type Period,
  type PeriodTotals,
} from '@payout-ledger/types';

/** Opening-balance overrides keyed by `YYYY-MM`. */
export type BalanceOverrides = ReadonlyMap<string, Decimal>;

export interface PeriodBalance {
  period: Period;
  openingBalance: Decimal;
  openingBalanceSource: OpeningBalanceSource;
  closingBalance: Decimal;
}

export interface OpeningBalanceResolution {
  amount: Decimal;
  source: OpeningBalanceSource;
  /** Months walked to reach the target, oldest first. */
  chain: PeriodBalance[];
}

/** Ledger order: creation time, then record id. */
export function compareClassified(a: ClassifiedRecord, b: ClassifiedRecord): number {
  return (
    compareTimestamps(a.record.createdAt, b.record.createdAt) ||
    (a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0)
  );
}

/**
 * Primary records grouped by the month they were created in, each group in
 * ledger order.
 */
export function groupByCreatedPeriod(
  classified: readonly ClassifiedRecord[]
): Map<string, ClassifiedRecord[]> {
  const groups = new Map<string, ClassifiedRecord[]>();
  for (const item of classified) {
    if (item.tier !== 'primary') continue;
    const key = item.record.createdAt.slice(0, 7);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [item]);
    } else {
      group.push(item);
    }
  }
  for (const group of groups.values()) {
    group.sort(compareClassified);
  }
  return groups;
}

export function emptyTotals(): PeriodTotals {
  return {
    grossActivity: ZERO,
    feeActivity: ZERO,
    netActivity: ZERO,
    adjustments: ZERO,
    payouts: ZERO,
    counts: { payments: 0, refunds: 0, payouts: 0, fees: 0, adjustments: 0 },
  };
}

/**
 * Aggregate a month's primary records.
 *
 * gross = payments - refunds; fee = record fees + standalone fee records;
 * net = gross - fee; payouts are positive magnitudes.
 */
export function computePeriodTotals(records: readonly ClassifiedRecord[]): PeriodTotals {
  const totals = emptyTotals();
  let gross = ZERO;
  let fees = ZERO;
  let adjustments = ZERO;
  let payouts = ZERO;

  for (const item of records) {
    if (item.tier !== 'primary') continue;
    fees = fees.plus(item.record.fee);

    switch (item.nature) {
      case 'payment':
        gross = gross.plus(item.contribution);
        totals.counts.payments += 1;
        break;
      case 'refund':
        gross = gross.plus(item.contribution);
        totals.counts.refunds += 1;
        break;
      case 'payout':
        payouts = payouts.minus(item.contribution);
        totals.counts.payouts += 1;
        break;
      case 'processing_fee':
        fees = fees.minus(item.contribution);
        totals.counts.fees += 1;
        break;
      case 'adjustment':
        adjustments = adjustments.plus(item.contribution);
        totals.counts.adjustments += 1;
        break;
    }
  }

  return {
    grossActivity: gross,
    feeActivity: fees,
    netActivity: gross.minus(fees),
    adjustments,
    payouts,
    counts: totals.counts,
  };
}

/** closing = opening + net + adjustments - payouts */
export function closingBalanceOf(opening: Decimal, totals: PeriodTotals): Decimal {
  return opening.plus(totals.netActivity).plus(totals.adjustments).minus(totals.payouts);
}

function earliestPeriod(keys: Iterable<string>): string | null {
  let earliest: string | null = null;
  for (const key of keys) {
    if (earliest === null || key < earliest) earliest = key;
  }
  return earliest;
}

/**
 * Opening balance of `target`, derived by walking forward from the first
 * month with data (or the first override) and carrying each closing balance
 * into the next month. Overrides met on the way replace the carried value.
 * Returns zero with source `default-zero` when nothing precedes the target.
 */
export function resolveOpeningBalance(
  groups: ReadonlyMap<string, readonly ClassifiedRecord[]>,
  target: Period,
  overrides: BalanceOverrides = new Map()
): OpeningBalanceResolution {
  const targetKey = formatPeriod(target);
  const override = overrides.get(targetKey);
  if (override !== undefined) {
    return { amount: override, source: 'override', chain: [] };
  }

  const priorKeys = [...groups.keys(), ...overrides.keys()].filter((key) => key < targetKey);
  const startKey = earliestPeriod(priorKeys);
  if (startKey === null) {
    return { amount: ZERO, source: 'default-zero', chain: [] };
  }

  const chain: PeriodBalance[] = [];
  let carried = ZERO;
  let carriedSource: OpeningBalanceSource = 'default-zero';

  for (
    let period = periodOfTimestamp(startKey);
    comparePeriods(period, target) < 0;
    period = nextPeriod(period)
  ) {
    const key = formatPeriod(period);
    const periodOverride = overrides.get(key);
    const openingBalance = periodOverride ?? carried;
    const openingBalanceSource: OpeningBalanceSource =
      periodOverride !== undefined ? 'override' : carriedSource;

    const closingBalance = closingBalanceOf(openingBalance, computePeriodTotals(groups.get(key) ?? []));
    chain.push({ period, openingBalance, openingBalanceSource, closingBalance });

    carried = closingBalance;
    carriedSource = 'carried-forward';
  }

  return { amount: carried, source: 'carried-forward', chain };
}

/** Months with primary activity, oldest first. */
export function periodsWithActivity(groups: ReadonlyMap<string, unknown>): Period[] {
  return [...groups.keys()].sort().map((key) => periodOfTimestamp(key));
}

import type { Decimal } from 'decimal.js';
import {
  ZERO,
  isInRange,
  toIsoDate,
  type BalanceSummary,
  type ClassifiedRecord,
  type DateRange,
  type OpeningBalanceSource,
  type Period,
  type StatementCompany,
  type StatementWarning,
} from '@payout-ledger/types';
import { closingBalanceOf, computePeriodTotals } from './engine.js';

export interface StartingBalance {
  amount: Decimal;
  source: OpeningBalanceSource;
}

/**
 * Balance at the start of `range.from`: the month's opening balance plus
 * everything the month recorded on earlier days.
 */
export function startingBalanceFor(
  monthOpening: StartingBalance,
  monthRecords: readonly ClassifiedRecord[],
  range: DateRange
): StartingBalance {
  const earlier = monthRecords.filter((item) => toIsoDate(item.record.createdAt) < range.from);
  if (earlier.length === 0) return monthOpening;
  return {
    amount: closingBalanceOf(monthOpening.amount, computePeriodTotals(earlier)),
    source: monthOpening.source,
  };
}

export interface BuildBalanceSummaryInput {
  company: StatementCompany;
  period: Period;
  range: DateRange;
  starting: StartingBalance;
  /** Primary records of the month, in ledger order. */
  records: readonly ClassifiedRecord[];
  warnings?: readonly StatementWarning[];
}

/**
 * Processor-style balance summary for a day range. Fees are reported as
 * negative amounts; ending = starting + activity net + adjustments + payouts net.
 */
export function buildBalanceSummary(input: BuildBalanceSummaryInput): BalanceSummary {
  let chargeCount = 0;
  let refundCount = 0;
  let chargesGross = ZERO;
  let refundsGross = ZERO;
  let activityFees = ZERO;
  let adjustmentCount = 0;
  let adjustmentAmount = ZERO;
  let payoutCount = 0;
  let payoutGross = ZERO;
  let payoutFees = ZERO;

  for (const item of input.records) {
    if (item.tier !== 'primary' || !isInRange(item.record.createdAt, input.range)) continue;
    const fee = item.record.fee;

    switch (item.nature) {
      case 'payment':
        chargeCount += 1;
        chargesGross = chargesGross.plus(item.contribution);
        activityFees = activityFees.plus(fee);
        break;
      case 'refund':
        refundCount += 1;
        refundsGross = refundsGross.plus(item.contribution);
        activityFees = activityFees.plus(fee);
        break;
      case 'processing_fee':
        activityFees = activityFees.plus(item.contribution.abs()).plus(fee);
        break;
      case 'adjustment':
        adjustmentCount += 1;
        adjustmentAmount = adjustmentAmount.plus(item.contribution).minus(fee);
        break;
      case 'payout':
        payoutCount += 1;
        payoutGross = payoutGross.plus(item.contribution);
        payoutFees = payoutFees.plus(fee);
        break;
    }
  }

  const gross = chargesGross.plus(refundsGross);
  const activityFee = activityFees.negated();
  const activityNet = gross.plus(activityFee);
  const payoutFee = payoutFees.negated();
  const payoutNet = payoutGross.plus(payoutFee);

  return {
    company: input.company,
    period: input.period,
    range: input.range,
    startingBalance: input.starting.amount,
    startingBalanceSource: input.starting.source,
    activity: {
      chargeCount,
      refundCount,
      chargesGross,
      refundsGross,
      gross,
      fee: activityFee,
      net: activityNet,
    },
    adjustments: { count: adjustmentCount, amount: adjustmentAmount },
    payouts: { count: payoutCount, gross: payoutGross, fee: payoutFee, net: payoutNet },
    endingBalance: input.starting.amount.plus(activityNet).plus(adjustmentAmount).plus(payoutNet),
    warnings: input.warnings ?? [],
  };
}

import type { Decimal } from 'decimal.js';
import {
  ZERO,
  isAfterPeriod,
  isInPeriod,
  isOnOrBeforePeriodEnd,
  type ActivitySection,
  type ClassifiedRecord,
  type Period,
  type PayoutReport,
  type ReconciliationSections,
  type StatementCompany,
  type StatementWarning,
} from '@payout-ledger/types';
import { compareClassified } from './engine.js';

function emptySection(): ActivitySection {
  return { count: 0, grossAmount: ZERO, fees: ZERO, netAmount: ZERO };
}

function addTo(section: ActivitySection, item: ClassifiedRecord, counted: boolean): ActivitySection {
  const grossAmount = section.grossAmount.plus(counted ? item.contribution : ZERO);
  const fees = section.fees.plus(item.feeContribution).plus(counted ? ZERO : item.contribution);
  return {
    count: section.count + (counted ? 1 : 0),
    grossAmount,
    fees,
    netAmount: grossAmount.plus(fees),
  };
}

/**
 * Sort records into the processor's report categories. Standalone fee
 * records land in the charge fees without adding to the charge count.
 */
export function summarizeSections(records: readonly ClassifiedRecord[]): ReconciliationSections {
  const sections: ReconciliationSections = {
    charges: emptySection(),
    refunds: emptySection(),
    payoutReversals: emptySection(),
  };

  for (const item of records) {
    switch (item.nature) {
      case 'payment':
        sections.charges = addTo(sections.charges, item, true);
        break;
      case 'processing_fee':
        sections.charges = addTo(sections.charges, item, false);
        break;
      case 'refund':
        sections.refunds = addTo(sections.refunds, item, true);
        break;
      case 'adjustment':
        sections.payoutReversals = addTo(sections.payoutReversals, item, true);
        break;
      case 'payout':
        break;
    }
  }
  return sections;
}

export function sectionsTotal(sections: ReconciliationSections): Decimal {
  return sections.charges.netAmount
    .plus(sections.refunds.netAmount)
    .plus(sections.payoutReversals.netAmount);
}

/**
 * Payout view of a month, keyed on transfer date rather than creation date.
 *
 * The payout section holds primary non-payout records transferred during
 * the month. The ending-balance section holds those created by month end
 * whose transfer falls after it or has not happened.
 */
export function buildPayoutReport(
  company: StatementCompany,
  classified: readonly ClassifiedRecord[],
  period: Period,
  warnings: readonly StatementWarning[] = []
): PayoutReport {
  const eligible = classified
    .filter((item) => item.tier === 'primary' && item.nature !== 'payout')
    .sort(compareClassified);

  const payoutTransactions = eligible.filter(
    (item) => item.record.transferDate !== null && isInPeriod(item.record.transferDate, period)
  );
  const endingBalanceTransactions = eligible.filter(
    (item) =>
      isOnOrBeforePeriodEnd(item.record.createdAt, period) &&
      (item.record.transferDate === null || isAfterPeriod(item.record.transferDate, period))
  );

  const payoutSections = summarizeSections(payoutTransactions);
  const endingSections = summarizeSections(endingBalanceTransactions);

  return {
    company,
    period,
    payoutReconciliation: { ...payoutSections, totalPaidOut: sectionsTotal(payoutSections) },
    endingBalanceReconciliation: { ...endingSections, endingBalance: sectionsTotal(endingSections) },
    payoutTransactions,
    endingBalanceTransactions,
    warnings,
  };
}

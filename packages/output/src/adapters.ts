/**
 * JSON adapters: convert statements, payout reports and summaries into the
 * documents described by the schemas under packages/types/schemas. Amounts
 * become two-decimal strings so no precision is lost in transit.
 */

import type { Decimal } from 'decimal.js';
import {
  formatAmount,
  formatPeriod,
  validateOutputOrThrow,
  type ActivitySection,
  type BalanceSummary,
  type ClassifiedRecord,
  type DateRange,
  type FeeBucket,
  type FeeCategory,
  type FeeSummary,
  type KnownCsvShape,
  type LedgerRowKind,
  type Nature,
  type OpeningBalanceSource,
  type Period,
  type PayoutReport,
  type RecordStatus,
  type Statement,
  type StatementCompany,
  type StatementWarning,
} from '@payout-ledger/types';

export interface PeriodJson {
  year: number;
  month: number;
  label: string;
}

export interface LedgerRowJson {
  kind: LedgerRowKind;
  date: string;
  nature: Nature | null;
  label: string;
  party: string;
  description: string;
  debit: string | null;
  credit: string | null;
  balance: string | null;
  recordId: string | null;
}

export interface StatementJson {
  schemaVersion: 'statement.v1';
  company: StatementCompany;
  period: PeriodJson;
  openingBalance: string;
  openingBalanceSource: OpeningBalanceSource;
  closingBalance: string;
  totals: {
    grossActivity: string;
    feeActivity: string;
    netActivity: string;
    adjustments: string;
    payouts: string;
    debit: string;
    credit: string;
  };
  counts: {
    payments: number;
    refunds: number;
    payouts: number;
    fees: number;
    adjustments: number;
  };
  ledgerRows: LedgerRowJson[];
  customerSummary: {
    rows: Array<{
      date: string;
      recordId: string;
      customerName: string | null;
      email: string | null;
      party: string;
      amount: string;
    }>;
    total: string;
  };
  secondaryRecords: Array<{
    id: string;
    createdAt: string;
    status: RecordStatus;
    nature: Nature;
    grossAmount: string;
    fee: string;
    party: string;
  }>;
  warnings: StatementWarning[];
}

export interface SectionJson {
  count: number;
  grossAmount: string;
  fees: string;
  netAmount: string;
}

export interface TransactionJson {
  id: string;
  createdAt: string;
  transferDate: string | null;
  nature: Nature;
  grossAmount: string;
  fee: string;
  party: string;
}

export interface PayoutReportJson {
  schemaVersion: 'payout-report.v1';
  company: StatementCompany;
  period: PeriodJson;
  payoutReconciliation: {
    charges: SectionJson;
    refunds: SectionJson;
    payoutReversals: SectionJson;
    totalPaidOut: string;
  };
  endingBalanceReconciliation: {
    charges: SectionJson;
    refunds: SectionJson;
    payoutReversals: SectionJson;
    endingBalance: string;
  };
  payoutTransactions: TransactionJson[];
  endingBalanceTransactions: TransactionJson[];
  warnings: StatementWarning[];
}

export interface FeeBucketJson {
  count: number;
  amount: string;
  fee: string;
  net: string;
}

export interface FeeSummaryJson {
  schemaVersion: 'fee-summary.v1';
  range: DateRange;
  currency: string;
  total: FeeBucketJson;
  byCategory: Record<FeeCategory, FeeBucketJson>;
  bySource: Record<KnownCsvShape, FeeBucketJson>;
  byCompany: Array<FeeBucketJson & { company: string; byCategory: Record<FeeCategory, FeeBucketJson> }>;
  warnings: StatementWarning[];
}

export interface BalanceSummaryJson {
  schemaVersion: 'balance-summary.v1';
  company: StatementCompany;
  period: PeriodJson;
  range: DateRange;
  startDay: number;
  endDay: number;
  startingBalance: string;
  startingBalanceSource: OpeningBalanceSource;
  activity: {
    chargeCount: number;
    refundCount: number;
    charges: string;
    refunds: string;
    gross: string;
    fee: string;
    net: string;
  };
  adjustments: { count: number; amount: string };
  payouts: { count: number; gross: string; fee: string; net: string };
  endingBalance: string;
  warnings: StatementWarning[];
}

function nullableAmount(amount: Decimal | null): string | null {
  return amount === null ? null : formatAmount(amount);
}

function periodJson(period: Period): PeriodJson {
  return { year: period.year, month: period.month, label: formatPeriod(period) };
}

function companyJson(company: StatementCompany): StatementCompany {
  return { code: company.code, name: company.name, legalName: company.legalName, currency: company.currency };
}

function warningsJson(warnings: readonly StatementWarning[]): StatementWarning[] {
  return warnings.map((warning) => ({ ...warning }));
}

export function toStatementJson(statement: Statement): StatementJson {
  const { period } = statement;
  const json: StatementJson = {
    schemaVersion: 'statement.v1',
    company: companyJson(statement.company),
    period: periodJson(period),
    openingBalance: formatAmount(period.openingBalance),
    openingBalanceSource: period.openingBalanceSource,
    closingBalance: formatAmount(period.closingBalance),
    totals: {
      grossActivity: formatAmount(period.totals.grossActivity),
      feeActivity: formatAmount(period.totals.feeActivity),
      netActivity: formatAmount(period.totals.netActivity),
      adjustments: formatAmount(period.totals.adjustments),
      payouts: formatAmount(period.totals.payouts),
      debit: formatAmount(statement.totals.debit),
      credit: formatAmount(statement.totals.credit),
    },
    counts: { ...period.totals.counts },
    ledgerRows: statement.ledgerRows.map((row) => ({
      kind: row.kind,
      date: row.date,
      nature: row.nature,
      label: row.label,
      party: row.party,
      description: row.description,
      debit: nullableAmount(row.debit),
      credit: nullableAmount(row.credit),
      balance: nullableAmount(row.balance),
      recordId: row.recordId,
    })),
    customerSummary: {
      rows: statement.customerSummary.rows.map((row) => ({
        date: row.date,
        recordId: row.recordId,
        customerName: row.customerName,
        email: row.email,
        party: row.party,
        amount: formatAmount(row.amount),
      })),
      total: formatAmount(statement.customerSummary.total),
    },
    secondaryRecords: statement.secondaryRecords.map((item) => ({
      id: item.record.id,
      createdAt: item.record.createdAt,
      status: item.record.status,
      nature: item.nature,
      grossAmount: formatAmount(item.record.amountGross),
      fee: formatAmount(item.record.fee),
      party: item.customer.party,
    })),
    warnings: warningsJson(statement.warnings),
  };

  validateOutputOrThrow('statement.v1', json);
  return json;
}

function sectionJson(section: ActivitySection): SectionJson {
  return {
    count: section.count,
    grossAmount: formatAmount(section.grossAmount),
    fees: formatAmount(section.fees),
    netAmount: formatAmount(section.netAmount),
  };
}

function transactionJson(item: ClassifiedRecord): TransactionJson {
  return {
    id: item.record.id,
    createdAt: item.record.createdAt,
    transferDate: item.record.transferDate,
    nature: item.nature,
    grossAmount: formatAmount(item.contribution),
    fee: formatAmount(item.record.fee),
    party: item.customer.party,
  };
}

export function toPayoutReportJson(report: PayoutReport): PayoutReportJson {
  const payout = report.payoutReconciliation;
  const ending = report.endingBalanceReconciliation;
  const json: PayoutReportJson = {
    schemaVersion: 'payout-report.v1',
    company: companyJson(report.company),
    period: periodJson(report.period),
    payoutReconciliation: {
      charges: sectionJson(payout.charges),
      refunds: sectionJson(payout.refunds),
      payoutReversals: sectionJson(payout.payoutReversals),
      totalPaidOut: formatAmount(payout.totalPaidOut),
    },
    endingBalanceReconciliation: {
      charges: sectionJson(ending.charges),
      refunds: sectionJson(ending.refunds),
      payoutReversals: sectionJson(ending.payoutReversals),
      endingBalance: formatAmount(ending.endingBalance),
    },
    payoutTransactions: report.payoutTransactions.map(transactionJson),
    endingBalanceTransactions: report.endingBalanceTransactions.map(transactionJson),
    warnings: warningsJson(report.warnings),
  };

  validateOutputOrThrow('payout-report.v1', json);
  return json;
}


function bucketJson(bucket: FeeBucket): FeeBucketJson {
  return {
    count: bucket.count,
    amount: formatAmount(bucket.amount),
    fee: formatAmount(bucket.fee),
    net: formatAmount(bucket.net),
  };
}

function categoriesJson(categories: Record<FeeCategory, FeeBucket>): Record<FeeCategory, FeeBucketJson> {
  return {
    Conference: bucketJson(categories.Conference),
    Subscription: bucketJson(categories.Subscription),
    Other: bucketJson(categories.Other),
  };
}

export function toFeeSummaryJson(summary: FeeSummary): FeeSummaryJson {
  const json: FeeSummaryJson = {
    schemaVersion: 'fee-summary.v1',
    range: { from: summary.range.from, to: summary.range.to },
    currency: summary.currency,
    total: bucketJson(summary.total),
    byCategory: categoriesJson(summary.byCategory),
    bySource: {
      unified_payments: bucketJson(summary.bySource.unified_payments),
      balance_history: bucketJson(summary.bySource.balance_history),
      itemised_balance_activity: bucketJson(summary.bySource.itemised_balance_activity),
    },
    byCompany: summary.byCompany.map((entry) => ({
      company: entry.company,
      ...bucketJson(entry),
      byCategory: categoriesJson(entry.byCategory),
    })),
    warnings: warningsJson(summary.warnings),
  };

  validateOutputOrThrow('fee-summary.v1', json);
  return json;
}

function dayOf(isoDate: string): number {
  return Number(isoDate.slice(8, 10));
}

export function toBalanceSummaryJson(summary: BalanceSummary): BalanceSummaryJson {
  const { activity, payouts } = summary;
  const json: BalanceSummaryJson = {
    schemaVersion: 'balance-summary.v1',
    company: companyJson(summary.company),
    period: periodJson(summary.period),
    range: { from: summary.range.from, to: summary.range.to },
    startDay: dayOf(summary.range.from),
    endDay: dayOf(summary.range.to),
    startingBalance: formatAmount(summary.startingBalance),
    startingBalanceSource: summary.startingBalanceSource,
    activity: {
      chargeCount: activity.chargeCount,
      refundCount: activity.refundCount,
      charges: formatAmount(activity.chargesGross),
      refunds: formatAmount(activity.refundsGross),
      gross: formatAmount(activity.gross),
      fee: formatAmount(activity.fee),
      net: formatAmount(activity.net),
    },
    adjustments: { count: summary.adjustments.count, amount: formatAmount(summary.adjustments.amount) },
    payouts: {
      count: payouts.count,
      gross: formatAmount(payouts.gross),
      fee: formatAmount(payouts.fee),
      net: formatAmount(payouts.net),
    },
    endingBalance: formatAmount(summary.endingBalance),
    warnings: warningsJson(summary.warnings),
  };

  validateOutputOrThrow('balance-summary.v1', json);
  return json;
}

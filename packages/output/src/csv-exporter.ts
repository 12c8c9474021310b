/**
 * CSV Exporter Module
 *
 * Flattens statements and payout reports into CSV for spreadsheet import.
 */

import type { Decimal } from 'decimal.js';
import {
  FEE_CATEGORIES,
  formatAmount,
  type ActivitySection,
  type BalanceSummary,
  type FeeBucket,
  type FeeSummary,
  type KnownCsvShape,
  type PayoutReport,
  type Statement,
} from '@payout-ledger/types';
import { formatCell, formatDate, type DateFormat } from './format.js';

export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Append a Record ID column to ledger rows (default: false) */
  includeRecordIds?: boolean;
  /** Append the customer summary block after the ledger (default: true) */
  includeCustomerSummary?: boolean;
  /** Date format: 'iso' (YYYY-MM-DD) or 'us' (MM/DD/YYYY) (default: 'iso') */
  dateFormat?: DateFormat;
}

const LEDGER_COLUMNS = ['Date', 'Nature', 'Party', 'Debit', 'Credit', 'Balance', 'Description'] as const;

const CUSTOMER_COLUMNS = ['Date', 'Customer', 'Email', 'Amount'] as const;

const PAYOUT_COLUMNS = ['Section', 'Category', 'Count', 'Gross', 'Fees', 'Net'] as const;

const FEE_COLUMNS = ['Group', 'Key', 'Count', 'Amount', 'Fee', 'Net'] as const;

const BALANCE_COLUMNS = ['Category', 'Count', 'Gross', 'Fee', 'Net'] as const;

const SOURCE_LABELS: ReadonlyArray<[KnownCsvShape, string]> = [
  ['unified_payments', 'Unified payments'],
  ['balance_history', 'Balance history'],
  ['itemised_balance_activity', 'Itemised balance activity'],
];

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
export function escapeCsvValue(value: string | number | null | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);
  const needsQuoting =
    str.includes(delimiter) || str.includes('"') || str.includes('\n') || str.includes('\r');

  return needsQuoting ? `"${str.replace(/"/g, '""')}"` : str;
}

function rowToCsvLine(row: readonly string[], delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

function resolveOptions(options: CsvExportOptions): Required<CsvExportOptions> {
  return {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    includeRecordIds: options.includeRecordIds ?? false,
    includeCustomerSummary: options.includeCustomerSummary ?? true,
    dateFormat: options.dateFormat ?? 'iso',
  };
}

/**
 * Export a monthly statement: the ledger (opening, postings, subtotal,
 * closing) followed by a blank line and the customer summary.
 */
export function exportStatementCsv(statement: Statement, options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    const header: string[] = [...LEDGER_COLUMNS];
    if (opts.includeRecordIds) header.push('Record ID');
    lines.push(rowToCsvLine(header, opts.delimiter));
  }

  for (const row of statement.ledgerRows) {
    const cells = [
      formatDate(row.date, opts.dateFormat),
      row.label,
      row.party,
      formatCell(row.debit),
      formatCell(row.credit),
      formatCell(row.balance),
      row.description,
    ];
    if (opts.includeRecordIds) cells.push(row.recordId ?? '');
    lines.push(rowToCsvLine(cells, opts.delimiter));
  }

  if (opts.includeCustomerSummary) {
    lines.push('');
    if (opts.includeHeader) {
      lines.push(rowToCsvLine(CUSTOMER_COLUMNS, opts.delimiter));
    }
    for (const row of statement.customerSummary.rows) {
      lines.push(
        rowToCsvLine(
          [formatDate(row.date, opts.dateFormat), row.customerName ?? row.party, row.email ?? '', formatAmount(row.amount)],
          opts.delimiter
        )
      );
    }
    lines.push(rowToCsvLine(['Total', '', '', formatAmount(statement.customerSummary.total)], opts.delimiter));
  }

  return lines.join('\n') + '\n';
}

function sectionLine(section: string, category: string, activity: ActivitySection): string[] {
  return [
    section,
    category,
    String(activity.count),
    formatAmount(activity.grossAmount),
    formatAmount(activity.fees),
    formatAmount(activity.netAmount),
  ];
}

function totalLine(section: string, category: string, amount: Decimal): string[] {
  return [section, category, '', '', '', formatAmount(amount)];
}

/**
 * Export a payout report in the processor's layout: one line per category
 * for each section, then the section total.
 */
export function exportPayoutReportCsv(report: PayoutReport, options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const payout = report.payoutReconciliation;
  const ending = report.endingBalanceReconciliation;
  const payoutSection = 'Payout reconciliation';
  const endingSection = 'Ending balance reconciliation';

  const rows: string[][] = [
    sectionLine(payoutSection, 'Charges', payout.charges),
    sectionLine(payoutSection, 'Refunds', payout.refunds),
    sectionLine(payoutSection, 'Payout reversals', payout.payoutReversals),
    totalLine(payoutSection, 'Total paid out', payout.totalPaidOut),
    sectionLine(endingSection, 'Charges', ending.charges),
    sectionLine(endingSection, 'Refunds', ending.refunds),
    sectionLine(endingSection, 'Payout reversals', ending.payoutReversals),
    totalLine(endingSection, 'Ending balance', ending.endingBalance),
  ];

  const lines = rows.map((row) => rowToCsvLine(row, opts.delimiter));
  if (opts.includeHeader) {
    lines.unshift(rowToCsvLine(PAYOUT_COLUMNS, opts.delimiter));
  }
  return lines.join('\n') + '\n';
}

function bucketLine(group: string, key: string, bucket: FeeBucket): string[] {
  return [group, key, String(bucket.count), formatAmount(bucket.amount), formatAmount(bucket.fee), formatAmount(bucket.net)];
}

/**
 * Export a fee summary: the total, then one line per category, per export
 * and per company (with that company's categories under it).
 */
export function exportFeeSummaryCsv(summary: FeeSummary, options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const rows: string[][] = [bucketLine('Total', `${summary.range.from}..${summary.range.to}`, summary.total)];

  for (const category of FEE_CATEGORIES) {
    rows.push(bucketLine('Category', category, summary.byCategory[category]));
  }
  for (const [shape, label] of SOURCE_LABELS) {
    rows.push(bucketLine('Source', label, summary.bySource[shape]));
  }
  for (const entry of summary.byCompany) {
    rows.push(bucketLine('Company', entry.company, entry));
    for (const category of FEE_CATEGORIES) {
      rows.push(bucketLine(`Company ${entry.company}`, category, entry.byCategory[category]));
    }
  }

  const lines = rows.map((row) => rowToCsvLine(row, opts.delimiter));
  if (opts.includeHeader) {
    lines.unshift(rowToCsvLine(FEE_COLUMNS, opts.delimiter));
  }
  return lines.join('\n') + '\n';
}

/**
 * Export a balance summary in the processor's layout: starting balance,
 * activity lines, adjustments, payouts, then the ending balance.
 */
export function exportBalanceSummaryCsv(summary: BalanceSummary, options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const { activity, adjustments, payouts } = summary;
  const amountOnly = (category: string, amount: Decimal): string[] => [category, '', '', '', formatAmount(amount)];

  const rows: string[][] = [
    amountOnly('Starting balance', summary.startingBalance),
    ['Charges', String(activity.chargeCount), formatAmount(activity.chargesGross), '', ''],
    ['Refunds', String(activity.refundCount), formatAmount(activity.refundsGross), '', ''],
    ['Activity', String(activity.chargeCount + activity.refundCount), formatAmount(activity.gross), formatAmount(activity.fee), formatAmount(activity.net)],
    ['Adjustments', String(adjustments.count), formatAmount(adjustments.amount), '', formatAmount(adjustments.amount)],
    ['Payouts', String(payouts.count), formatAmount(payouts.gross), formatAmount(payouts.fee), formatAmount(payouts.net)],
    amountOnly('Ending balance', summary.endingBalance),
  ];

  const lines = rows.map((row) => rowToCsvLine(row, opts.delimiter));
  if (opts.includeHeader) {
    lines.unshift(rowToCsvLine(BALANCE_COLUMNS, opts.delimiter));
  }
  return lines.join('\n') + '\n';
}

import {
  FEE_CATEGORIES,
  LEDGER_VERSION,
  formatCurrency,
  periodLabel,
  type ActivitySection,
  type BalanceSummary,
  type FeeBucket,
  type FeeSummary,
  type PayoutReport,
  type ReconciliationSections,
  type Statement,
  type StatementWarning,
} from '@payout-ledger/types';
import type { Decimal } from 'decimal.js';
import { formatDate } from './format.js';

export type PdfAlign = 'left' | 'right';

export interface PdfColumn {
  header: string;
  width: number;
  align: PdfAlign;
}

export interface PdfTableRow {
  cells: string[];
  bold: boolean;
}

export type PdfBlock =
  | { type: 'heading'; text: string; level: 1 | 2 }
  | { type: 'text'; text: string; size: number }
  | { type: 'keyValue'; entries: Array<{ label: string; value: string }> }
  | { type: 'table'; columns: PdfColumn[]; rows: PdfTableRow[] };

/**
 * Page content as plain data. The renderer only draws what is here, so
 * layouts can be asserted without decoding a PDF.
 */
export interface PdfLayout {
  title: string;
  size: 'A4';
  margin: number;
  blocks: PdfBlock[];
}

const MARGIN = 40;

function money(amount: Decimal | null, currency: string): string {
  return amount === null ? '' : formatCurrency(amount, currency);
}

function warningBlocks(warnings: readonly StatementWarning[]): PdfBlock[] {
  if (warnings.length === 0) return [];
  return [
    { type: 'heading', text: 'Warnings', level: 2 },
    ...warnings.map<PdfBlock>((warning) => ({
      type: 'text',
      text: `${warning.code}: ${warning.message}`,
      size: 8,
    })),
  ];
}

function footer(): PdfBlock {
  return { type: 'text', text: `Generated by payout-ledger ${LEDGER_VERSION}`, size: 7 };
}

export function buildStatementPdfLayout(statement: Statement): PdfLayout {
  const { company, period } = statement;
  const currency = company.currency;

  const ledger: PdfBlock = {
    type: 'table',
    columns: [
      { header: 'Date', width: 60, align: 'left' },
      { header: 'Nature', width: 72, align: 'left' },
      { header: 'Party', width: 118, align: 'left' },
      { header: 'Description', width: 85, align: 'left' },
      { header: 'Debit', width: 58, align: 'right' },
      { header: 'Credit', width: 58, align: 'right' },
      { header: 'Balance', width: 64, align: 'right' },
    ],
    rows: statement.ledgerRows.map((row) => ({
      cells: [
        formatDate(row.date),
        row.label,
        row.party,
        row.description,
        money(row.debit, currency),
        money(row.credit, currency),
        money(row.balance, currency),
      ],
      bold: row.kind !== 'transaction',
    })),
  };

  const customers: PdfBlock = {
    type: 'table',
    columns: [
      { header: 'Date', width: 70, align: 'left' },
      { header: 'Customer', width: 170, align: 'left' },
      { header: 'Email', width: 175, align: 'left' },
      { header: 'Amount', width: 100, align: 'right' },
    ],
    rows: [
      ...statement.customerSummary.rows.map((row) => ({
        cells: [row.date, row.customerName ?? row.party, row.email ?? '', money(row.amount, currency)],
        bold: false,
      })),
      { cells: ['Total', '', '', money(statement.customerSummary.total, currency)], bold: true },
    ],
  };

  return {
    title: `${company.name} statement ${periodLabel(period)}`,
    size: 'A4',
    margin: MARGIN,
    blocks: [
      { type: 'heading', text: company.legalName ?? company.name, level: 1 },
      { type: 'text', text: `Monthly statement for ${periodLabel(period)} (${currency})`, size: 10 },
      {
        type: 'keyValue',
        entries: [
          { label: 'Opening balance', value: money(period.openingBalance, currency) },
          { label: 'Net activity', value: money(period.totals.netActivity, currency) },
          { label: 'Adjustments', value: money(period.totals.adjustments, currency) },
          { label: 'Payouts', value: money(period.totals.payouts, currency) },
          { label: 'Closing balance', value: money(period.closingBalance, currency) },
        ],
      },
      { type: 'heading', text: 'Ledger', level: 2 },
      ledger,
      { type: 'heading', text: 'Customer summary', level: 2 },
      customers,
      ...warningBlocks(statement.warnings),
      footer(),
    ],
  };
}

function sectionTable(sections: ReconciliationSections, totalLabel: string, total: Decimal, currency: string): PdfBlock {
  const labelled: Array<[string, ActivitySection]> = [
    ['Charges', sections.charges],
    ['Refunds', sections.refunds],
    ['Payout reversals', sections.payoutReversals],
  ];
  return {
    type: 'table',
    columns: [
      { header: 'Category', width: 155, align: 'left' },
      { header: 'Count', width: 60, align: 'right' },
      { header: 'Gross', width: 100, align: 'right' },
      { header: 'Fees', width: 100, align: 'right' },
      { header: 'Net', width: 100, align: 'right' },
    ],
    rows: [
      ...labelled.map(([label, section]) => ({
        cells: [
          label,
          String(section.count),
          money(section.grossAmount, currency),
          money(section.fees, currency),
          money(section.netAmount, currency),
        ],
        bold: false,
      })),
      { cells: [totalLabel, '', '', '', money(total, currency)], bold: true },
    ],
  };
}

export function buildPayoutReportPdfLayout(report: PayoutReport): PdfLayout {
  const currency = report.company.currency;
  return {
    title: `${report.company.name} payout reconciliation ${periodLabel(report.period)}`,
    size: 'A4',
    margin: MARGIN,
    blocks: [
      { type: 'heading', text: report.company.legalName ?? report.company.name, level: 1 },
      { type: 'text', text: `Payout reconciliation for ${periodLabel(report.period)} (${currency})`, size: 10 },
      { type: 'heading', text: 'Payout reconciliation', level: 2 },
      sectionTable(report.payoutReconciliation, 'Total paid out', report.payoutReconciliation.totalPaidOut, currency),
      { type: 'heading', text: 'Ending balance reconciliation', level: 2 },
      sectionTable(
        report.endingBalanceReconciliation,
        'Ending balance',
        report.endingBalanceReconciliation.endingBalance,
        currency
      ),
      ...warningBlocks(report.warnings),
      footer(),
    ],
  };
}

const BUCKET_COLUMNS: PdfColumn[] = [
  { header: '', width: 155, align: 'left' },
  { header: 'Count', width: 60, align: 'right' },
  { header: 'Amount', width: 100, align: 'right' },
  { header: 'Fee', width: 100, align: 'right' },
  { header: 'Net', width: 100, align: 'right' },
];

function bucketRow(label: string, bucket: FeeBucket, currency: string, bold = false): PdfTableRow {
  return {
    cells: [label, String(bucket.count), money(bucket.amount, currency), money(bucket.fee, currency), money(bucket.net, currency)],
    bold,
  };
}

export function buildFeeSummaryPdfLayout(summary: FeeSummary): PdfLayout {
  const { currency, range } = summary;
  return {
    title: `Fee summary ${range.from} to ${range.to}`,
    size: 'A4',
    margin: MARGIN,
    blocks: [
      { type: 'heading', text: 'Processing fees', level: 1 },
      { type: 'text', text: `${range.from} to ${range.to} (${currency})`, size: 10 },
      { type: 'heading', text: 'By category', level: 2 },
      {
        type: 'table',
        columns: BUCKET_COLUMNS,
        rows: [
          ...FEE_CATEGORIES.map((category) => bucketRow(category, summary.byCategory[category], currency)),
          bucketRow('Total', summary.total, currency, true),
        ],
      },
      { type: 'heading', text: 'By company', level: 2 },
      {
        type: 'table',
        columns: BUCKET_COLUMNS,
        rows: summary.byCompany.flatMap((entry) => [
          bucketRow(entry.company, entry, currency, true),
          ...FEE_CATEGORIES.map((category) => bucketRow(category, entry.byCategory[category], currency)),
        ]),
      },
      ...warningBlocks(summary.warnings),
      footer(),
    ],
  };
}

export function buildBalanceSummaryPdfLayout(summary: BalanceSummary): PdfLayout {
  const currency = summary.company.currency;
  const { activity, adjustments, payouts, range } = summary;
  const row = (cells: string[], bold = false): PdfTableRow => ({ cells, bold });

  return {
    title: `${summary.company.name} balance summary ${range.from} to ${range.to}`,
    size: 'A4',
    margin: MARGIN,
    blocks: [
      { type: 'heading', text: summary.company.legalName ?? summary.company.name, level: 1 },
      { type: 'text', text: `Balance summary for ${range.from} to ${range.to} (${currency})`, size: 10 },
      {
        type: 'table',
        columns: [
          { header: 'Category', width: 155, align: 'left' },
          { header: 'Count', width: 60, align: 'right' },
          { header: 'Gross', width: 100, align: 'right' },
          { header: 'Fee', width: 100, align: 'right' },
          { header: 'Net', width: 100, align: 'right' },
        ],
        rows: [
          row(['Starting balance', '', '', '', money(summary.startingBalance, currency)], true),
          row(['Charges', String(activity.chargeCount), money(activity.chargesGross, currency), '', '']),
          row(['Refunds', String(activity.refundCount), money(activity.refundsGross, currency), '', '']),
          row([
            'Activity',
            String(activity.chargeCount + activity.refundCount),
            money(activity.gross, currency),
            money(activity.fee, currency),
            money(activity.net, currency),
          ]),
          row(['Adjustments', String(adjustments.count), money(adjustments.amount, currency), '', money(adjustments.amount, currency)]),
          row([
            'Payouts',
            String(payouts.count),
            money(payouts.gross, currency),
            money(payouts.fee, currency),
            money(payouts.net, currency),
          ]),
          row(['Ending balance', '', '', '', money(summary.endingBalance, currency)], true),
        ],
      },
      ...warningBlocks(summary.warnings),
      footer(),
    ],
  };
}

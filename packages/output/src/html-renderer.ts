import type { Decimal } from 'decimal.js';
import {
  FEE_CATEGORIES,
  LEDGER_VERSION,
  formatCurrency,
  formatPeriod,
  periodLabel,
  type ActivitySection,
  type BalanceSummary,
  type FeeBucket,
  type FeeSummary,
  type PayoutReport,
  type Statement,
  type StatementCompany,
  type StatementWarning,
} from '@payout-ledger/types';
import { formatDate } from './format.js';

export interface HtmlRenderOptions {
  /** Overrides the document title */
  title?: string;
}

const STYLES = `
body { font-family: Helvetica, Arial, sans-serif; font-size: 12px; color: #222; margin: 24px; }
h1 { font-size: 20px; margin-bottom: 4px; }
h2 { font-size: 15px; margin-top: 24px; }
table { border-collapse: collapse; width: 100%; }
th, td { border-bottom: 1px solid #ddd; padding: 4px 6px; text-align: left; }
td.num, th.num { text-align: right; font-variant-numeric: tabular-nums; }
tr.opening-row td, tr.closing-row td, tr.subtotal-row td { font-weight: bold; background: #f4f4f4; }
.warnings li { color: #8a4b00; }
@media print { body { margin: 0; font-size: 10px; } h2 { page-break-after: avoid; } tr { page-break-inside: avoid; } }
`.trim();

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function money(amount: Decimal | null, currency: string): string {
  return amount === null ? '' : escapeHtml(formatCurrency(amount, currency));
}

function companyHeading(company: StatementCompany): string {
  return escapeHtml(company.legalName ?? company.name);
}

function page(title: string, body: string[]): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${STYLES}</style>`,
    '</head>',
    '<body>',
    ...body,
    `<footer><small>payout-ledger ${LEDGER_VERSION}</small></footer>`,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

function warningList(warnings: readonly StatementWarning[]): string[] {
  if (warnings.length === 0) return [];
  const items = warnings.map((warning) => {
    const location = warning.file === undefined ? '' : ` (${warning.file}${warning.row === undefined ? '' : ` row ${warning.row}`})`;
    return `<li>${escapeHtml(`${warning.code}: ${warning.message}${location}`)}</li>`;
  });
  return ['<h2>Warnings</h2>', '<ul class="warnings">', ...items, '</ul>'];
}

export function renderStatementHtml(statement: Statement, options: HtmlRenderOptions = {}): string {
  const { company, period } = statement;
  const currency = company.currency;
  const title = options.title ?? `${company.name} statement ${formatPeriod(period)}`;

  const ledgerRows = statement.ledgerRows.map(
    (row) =>
      `<tr class="${row.kind}-row"><td>${escapeHtml(formatDate(row.date))}</td><td>${escapeHtml(row.label)}</td>` +
      `<td>${escapeHtml(row.party)}</td><td>${escapeHtml(row.description)}</td>` +
      `<td class="num">${money(row.debit, currency)}</td><td class="num">${money(row.credit, currency)}</td>` +
      `<td class="num">${money(row.balance, currency)}</td></tr>`
  );

  const customerRows = statement.customerSummary.rows.map(
    (row) =>
      `<tr><td>${escapeHtml(row.date)}</td><td>${escapeHtml(row.customerName ?? row.party)}</td>` +
      `<td>${escapeHtml(row.email ?? '')}</td><td class="num">${money(row.amount, currency)}</td></tr>`
  );

  const secondaryRows = statement.secondaryRecords.map(
    (item) =>
      `<tr><td>${escapeHtml(formatDate(item.record.createdAt))}</td><td>${escapeHtml(item.record.id)}</td>` +
      `<td>${escapeHtml(item.record.status)}</td><td>${escapeHtml(item.customer.party)}</td>` +
      `<td class="num">${money(item.record.amountGross, currency)}</td></tr>`
  );

  const body = [
    `<h1>${companyHeading(company)}</h1>`,
    `<p>Statement for ${escapeHtml(periodLabel(period))} &middot; ${escapeHtml(currency)}</p>`,
    '<table class="summary">',
    `<tr><th>Opening balance</th><td class="num">${money(period.openingBalance, currency)}</td></tr>`,
    `<tr><th>Net activity</th><td class="num">${money(period.totals.netActivity, currency)}</td></tr>`,
    `<tr><th>Adjustments</th><td class="num">${money(period.totals.adjustments, currency)}</td></tr>`,
    `<tr><th>Payouts</th><td class="num">${money(period.totals.payouts, currency)}</td></tr>`,
    `<tr><th>Closing balance</th><td class="num">${money(period.closingBalance, currency)}</td></tr>`,
    '</table>',
    '<h2>Ledger</h2>',
    '<table class="ledger">',
    '<thead><tr><th>Date</th><th>Nature</th><th>Party</th><th>Description</th><th class="num">Debit</th><th class="num">Credit</th><th class="num">Balance</th></tr></thead>',
    '<tbody>',
    ...ledgerRows,
    '</tbody>',
    '</table>',
    '<h2>Customer summary</h2>',
    '<table class="customers">',
    '<thead><tr><th>Date</th><th>Customer</th><th>Email</th><th class="num">Amount</th></tr></thead>',
    '<tbody>',
    ...customerRows,
    `<tr class="subtotal-row"><td>Total</td><td></td><td></td><td class="num">${money(statement.customerSummary.total, currency)}</td></tr>`,
    '</tbody>',
    '</table>',
  ];

  if (secondaryRows.length > 0) {
    body.push(
      '<h2>Not settled</h2>',
      '<table class="secondary">',
      '<thead><tr><th>Date</th><th>Record</th><th>Status</th><th>Customer</th><th class="num">Amount</th></tr></thead>',
      '<tbody>',
      ...secondaryRows,
      '</tbody>',
      '</table>'
    );
  }

  body.push(...warningList(statement.warnings));
  return page(title, body);
}

function sectionRows(sections: Record<'charges' | 'refunds' | 'payoutReversals', ActivitySection>, currency: string): string[] {
  const labelled: Array<[string, ActivitySection]> = [
    ['Charges', sections.charges],
    ['Refunds', sections.refunds],
    ['Payout reversals', sections.payoutReversals],
  ];
  return labelled.map(
    ([label, section]) =>
      `<tr><td>${label}</td><td class="num">${section.count}</td><td class="num">${money(section.grossAmount, currency)}</td>` +
      `<td class="num">${money(section.fees, currency)}</td><td class="num">${money(section.netAmount, currency)}</td></tr>`
  );
}

const SECTION_HEAD =
  '<thead><tr><th>Category</th><th class="num">Count</th><th class="num">Gross</th><th class="num">Fees</th><th class="num">Net</th></tr></thead>';

export function renderPayoutReportHtml(report: PayoutReport, options: HtmlRenderOptions = {}): string {
  const currency = report.company.currency;
  const title = options.title ?? `${report.company.name} payout reconciliation ${formatPeriod(report.period)}`;
  const payout = report.payoutReconciliation;
  const ending = report.endingBalanceReconciliation;

  const body = [
    `<h1>${companyHeading(report.company)}</h1>`,
    `<p>Payout reconciliation for ${escapeHtml(periodLabel(report.period))} &middot; ${escapeHtml(currency)}</p>`,
    '<h2>Payout reconciliation</h2>',
    '<table class="payouts">',
    SECTION_HEAD,
    '<tbody>',
    ...sectionRows(payout, currency),
    `<tr class="subtotal-row"><td>Total paid out</td><td></td><td></td><td></td><td class="num">${money(payout.totalPaidOut, currency)}</td></tr>`,
    '</tbody>',
    '</table>',
    '<h2>Ending balance reconciliation</h2>',
    '<table class="ending">',
    SECTION_HEAD,
    '<tbody>',
    ...sectionRows(ending, currency),
    `<tr class="subtotal-row"><td>Ending balance</td><td></td><td></td><td></td><td class="num">${money(ending.endingBalance, currency)}</td></tr>`,
    '</tbody>',
    '</table>',
    ...warningList(report.warnings),
  ];
  return page(title, body);
}

const BUCKET_HEAD =
  '<thead><tr><th></th><th class="num">Count</th><th class="num">Amount</th><th class="num">Fee</th><th class="num">Net</th></tr></thead>';

function bucketRow(label: string, bucket: FeeBucket, currency: string, className = ''): string {
  const classAttr = className === '' ? '' : ` class="${className}"`;
  return (
    `<tr${classAttr}><td>${escapeHtml(label)}</td><td class="num">${bucket.count}</td>` +
    `<td class="num">${money(bucket.amount, currency)}</td><td class="num">${money(bucket.fee, currency)}</td>` +
    `<td class="num">${money(bucket.net, currency)}</td></tr>`
  );
}

function bucketTable(className: string, rows: string[]): string[] {
  return [`<table class="${className}">`, BUCKET_HEAD, '<tbody>', ...rows, '</tbody>', '</table>'];
}

export function renderFeeSummaryHtml(summary: FeeSummary, options: HtmlRenderOptions = {}): string {
  const { currency, range } = summary;
  const title = options.title ?? `Fee summary ${range.from} to ${range.to}`;

  const categoryRows = FEE_CATEGORIES.map((category) => bucketRow(category, summary.byCategory[category], currency));
  const sourceRows = [
    bucketRow('Unified payments', summary.bySource.unified_payments, currency),
    bucketRow('Balance history', summary.bySource.balance_history, currency),
    bucketRow('Itemised balance activity', summary.bySource.itemised_balance_activity, currency),
  ];
  const companyRows = summary.byCompany.flatMap((entry) => [
    bucketRow(entry.company, entry, currency, 'subtotal-row'),
    ...FEE_CATEGORIES.map((category) => bucketRow(category, entry.byCategory[category], currency)),
  ]);

  const body = [
    '<h1>Processing fees</h1>',
    `<p>${escapeHtml(range.from)} to ${escapeHtml(range.to)} &middot; ${escapeHtml(currency)}</p>`,
    '<h2>By category</h2>',
    ...bucketTable('categories', [...categoryRows, bucketRow('Total', summary.total, currency, 'subtotal-row')]),
    '<h2>By export</h2>',
    ...bucketTable('sources', sourceRows),
    '<h2>By company</h2>',
    ...bucketTable('companies', companyRows),
    ...warningList(summary.warnings),
  ];
  return page(title, body);
}

export function renderBalanceSummaryHtml(summary: BalanceSummary, options: HtmlRenderOptions = {}): string {
  const currency = summary.company.currency;
  const { activity, adjustments, payouts, range } = summary;
  const title = options.title ?? `${summary.company.name} balance summary ${range.from} to ${range.to}`;
  const cells = (label: string, count: string, gross: Decimal | null, fee: Decimal | null, net: Decimal | null): string =>
    `<tr><td>${label}</td><td class="num">${count}</td><td class="num">${money(gross, currency)}</td>` +
    `<td class="num">${money(fee, currency)}</td><td class="num">${money(net, currency)}</td></tr>`;

  const body = [
    `<h1>${companyHeading(summary.company)}</h1>`,
    `<p>Balance summary for ${escapeHtml(range.from)} to ${escapeHtml(range.to)} &middot; ${escapeHtml(currency)}</p>`,
    '<table class="balance">',
    '<thead><tr><th>Category</th><th class="num">Count</th><th class="num">Gross</th><th class="num">Fee</th><th class="num">Net</th></tr></thead>',
    '<tbody>',
    `<tr class="opening-row"><td>Starting balance</td><td></td><td></td><td></td><td class="num">${money(summary.startingBalance, currency)}</td></tr>`,
    cells('Charges', String(activity.chargeCount), activity.chargesGross, null, null),
    cells('Refunds', String(activity.refundCount), activity.refundsGross, null, null),
    cells('Activity', String(activity.chargeCount + activity.refundCount), activity.gross, activity.fee, activity.net),
    cells('Adjustments', String(adjustments.count), adjustments.amount, null, adjustments.amount),
    cells('Payouts', String(payouts.count), payouts.gross, payouts.fee, payouts.net),
    `<tr class="closing-row"><td>Ending balance</td><td></td><td></td><td></td><td class="num">${money(summary.endingBalance, currency)}</td></tr>`,
    '</tbody>',
    '</table>',
    ...warningList(summary.warnings),
  ];
  return page(title, body);
}

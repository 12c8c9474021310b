import type { BalanceSummary, FeeSummary, PayoutReport, Statement } from '@payout-ledger/types';
import { toBalanceSummaryJson, toFeeSummaryJson, toPayoutReportJson, toStatementJson } from './adapters.js';
import {
  exportBalanceSummaryCsv,
  exportFeeSummaryCsv,
  exportPayoutReportCsv,
  exportStatementCsv,
} from './csv-exporter.js';
import {
  renderBalanceSummaryHtml,
  renderFeeSummaryHtml,
  renderPayoutReportHtml,
  renderStatementHtml,
} from './html-renderer.js';
import {
  buildBalanceSummaryPdfLayout,
  buildFeeSummaryPdfLayout,
  buildPayoutReportPdfLayout,
  buildStatementPdfLayout,
} from './pdf-layout.js';
import { renderPdf } from './pdf-renderer.js';

export const OUTPUT_FORMATS = ['html', 'pdf', 'csv', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface RenderedDocument {
  format: OutputFormat;
  contentType: string;
  body: string | Buffer;
}

const CONTENT_TYPES: Readonly<Record<OutputFormat, string>> = {
  html: 'text/html; charset=utf-8',
  pdf: 'application/pdf',
  csv: 'text/csv; charset=utf-8',
  json: 'application/json',
};

function document(format: OutputFormat, body: string | Buffer): RenderedDocument {
  return { format, contentType: CONTENT_TYPES[format], body };
}

export async function renderStatement(statement: Statement, format: OutputFormat): Promise<RenderedDocument> {
  switch (format) {
    case 'html':
      return document(format, renderStatementHtml(statement));
    case 'pdf':
      return document(format, await renderPdf(buildStatementPdfLayout(statement)));
    case 'csv':
      return document(format, exportStatementCsv(statement));
    case 'json':
      return document(format, JSON.stringify(toStatementJson(statement), null, 2) + '\n');
  }
}

export async function renderPayoutReport(report: PayoutReport, format: OutputFormat): Promise<RenderedDocument> {
  switch (format) {
    case 'html':
      return document(format, renderPayoutReportHtml(report));
    case 'pdf':
      return document(format, await renderPdf(buildPayoutReportPdfLayout(report)));
    case 'csv':
      return document(format, exportPayoutReportCsv(report));
    case 'json':
      return document(format, JSON.stringify(toPayoutReportJson(report), null, 2) + '\n');
  }
}

export async function renderFeeSummary(summary: FeeSummary, format: OutputFormat): Promise<RenderedDocument> {
  switch (format) {
    case 'html':
      return document(format, renderFeeSummaryHtml(summary));
    case 'pdf':
      return document(format, await renderPdf(buildFeeSummaryPdfLayout(summary)));
    case 'csv':
      return document(format, exportFeeSummaryCsv(summary));
    case 'json':
      return document(format, JSON.stringify(toFeeSummaryJson(summary), null, 2) + '\n');
  }
}

export async function renderBalanceSummary(summary: BalanceSummary, format: OutputFormat): Promise<RenderedDocument> {
  switch (format) {
    case 'html':
      return document(format, renderBalanceSummaryHtml(summary));
    case 'pdf':
      return document(format, await renderPdf(buildBalanceSummaryPdfLayout(summary)));
    case 'csv':
      return document(format, exportBalanceSummaryCsv(summary));
    case 'json':
      return document(format, JSON.stringify(toBalanceSummaryJson(summary), null, 2) + '\n');
  }
}

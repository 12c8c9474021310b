/**
 * Output module - renders statements, payout reports and summaries.
 */

export {
  toStatementJson,
  toPayoutReportJson,
  toFeeSummaryJson,
  toBalanceSummaryJson,
  type StatementJson,
  type FeeSummaryJson,
  type FeeBucketJson,
  type BalanceSummaryJson,
  type PayoutReportJson,
  type LedgerRowJson,
  type PeriodJson,
  type SectionJson,
  type TransactionJson,
} from './adapters.js';

export {
  exportStatementCsv,
  exportPayoutReportCsv,
  exportFeeSummaryCsv,
  exportBalanceSummaryCsv,
  escapeCsvValue,
  type CsvExportOptions,
} from './csv-exporter.js';

export {
  renderStatementHtml,
  renderPayoutReportHtml,
  renderFeeSummaryHtml,
  renderBalanceSummaryHtml,
  escapeHtml,
  type HtmlRenderOptions,
} from './html-renderer.js';

export {
  buildStatementPdfLayout,
  buildPayoutReportPdfLayout,
  buildFeeSummaryPdfLayout,
  buildBalanceSummaryPdfLayout,
  type PdfLayout,
  type PdfBlock,
  type PdfColumn,
  type PdfTableRow,
  type PdfAlign,
} from './pdf-layout.js';

export { renderPdf } from './pdf-renderer.js';

export { formatDate, formatCell, type DateFormat } from './format.js';

export {
  renderStatement,
  renderPayoutReport,
  renderFeeSummary,
  renderBalanceSummary,
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
  type RenderedDocument,
} from './render.js';

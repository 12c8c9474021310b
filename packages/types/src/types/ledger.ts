import type { Decimal } from 'decimal.js';

export const RECORD_STATUSES = [
  'succeeded',
  'refunded',
  'failed',
  'pending',
  'canceled',
  'unknown',
] as const;

export type RecordStatus = (typeof RECORD_STATUSES)[number];

/** Primary records move money and enter the ledger; secondary ones are listed only. */
export type Tier = 'primary' | 'secondary';

export const NATURES = ['payment', 'refund', 'payout', 'processing_fee', 'adjustment'] as const;

export type Nature = (typeof NATURES)[number];

export type KnownCsvShape = 'unified_payments' | 'balance_history' | 'itemised_balance_activity';

export type CsvShape = KnownCsvShape | 'unrecognized';

export interface Period {
  year: number;
  month: number;
}

export interface IdentityCandidates {
  customerEmail: string | null;
  metadataEmail: string | null;
  customerDescription: string | null;
  userId: string | null;
}

export interface RecordOrigin {
  file: string;
  /** 1-based data row, header excluded */
  row: number;
  shape: KnownCsvShape;
}

/**
 * One normalized money movement. Amounts are in the company's reporting
 * currency; `fee` is never negative. Timestamps are ISO-8601 UTC.
 */
export interface TransactionRecord {
  id: string;
  company: string;
  createdAt: string;
  transferDate: string | null;
  amountGross: Decimal;
  fee: Decimal;
  currency: string;
  status: RecordStatus;
  sourceType: string | null;
  sourceId: string | null;
  customerName: string | null;
  description: string | null;
  identity: IdentityCandidates;
  /** Non-empty `... (metadata)` columns of the export row, keyed by column name. */
  metadata: Readonly<Record<string, string>>;
  origin: RecordOrigin;
}

export interface CustomerIdentity {
  email: string | null;
  name: string | null;
  /** Display label: the winning identity candidate, else the name, else `N/A`. */
  party: string;
}

export interface ClassifiedRecord {
  record: TransactionRecord;
  tier: Tier;
  nature: Nature;
  /** Signed effect of the gross amount on the balance. */
  contribution: Decimal;
  /** Signed effect of the fee on the balance (zero or negative). */
  feeContribution: Decimal;
  customer: CustomerIdentity;
}

export type PostingKind = 'primary' | 'fee';

export interface LedgerPosting {
  source: ClassifiedRecord;
  kind: PostingKind;
  nature: Nature;
  amount: Decimal;
}

export interface ActivityCounts {
  payments: number;
  refunds: number;
  payouts: number;
  fees: number;
  adjustments: number;
}

export interface PeriodTotals {
  grossActivity: Decimal;
  feeActivity: Decimal;
  netActivity: Decimal;
  adjustments: Decimal;
  payouts: Decimal;
  counts: ActivityCounts;
}

export type OpeningBalanceSource = 'override' | 'carried-forward' | 'default-zero';

export interface ReconciliationPeriod {
  company: string;
  year: number;
  month: number;
  openingBalance: Decimal;
  openingBalanceSource: OpeningBalanceSource;
  /** Primary records created in the period, in ledger order. */
  records: readonly ClassifiedRecord[];
  totals: PeriodTotals;
  closingBalance: Decimal;
}

export type LedgerRowKind = 'opening' | 'transaction' | 'subtotal' | 'closing';

export interface LedgerRow {
  kind: LedgerRowKind;
  /** YYYY-MM-DD */
  date: string;
  nature: Nature | null;
  label: string;
  party: string;
  description: string;
  debit: Decimal | null;
  credit: Decimal | null;
  balance: Decimal | null;
  recordId: string | null;
}

export interface CustomerSummaryRow {
  date: string;
  recordId: string;
  customerName: string | null;
  email: string | null;
  party: string;
  amount: Decimal;
}

export interface CustomerSummary {
  rows: readonly CustomerSummaryRow[];
  total: Decimal;
}

export interface StatementCompany {
  code: string;
  name: string;
  legalName: string | null;
  currency: string;
}

export interface StatementWarning {
  code: string;
  message: string;
  file?: string;
  row?: number;
}

export interface Statement {
  company: StatementCompany;
  period: ReconciliationPeriod;
  ledgerRows: readonly LedgerRow[];
  totals: {
    debit: Decimal;
    credit: Decimal;
  };
  customerSummary: CustomerSummary;
  secondaryRecords: readonly ClassifiedRecord[];
  warnings: readonly StatementWarning[];
}

export interface ActivitySection {
  count: number;
  grossAmount: Decimal;
  /** Zero or negative. */
  fees: Decimal;
  netAmount: Decimal;
}

export interface ReconciliationSections {
  charges: ActivitySection;
  refunds: ActivitySection;
  payoutReversals: ActivitySection;
}

export interface PayoutReport {
  company: StatementCompany;
  period: Period;
  payoutReconciliation: ReconciliationSections & { totalPaidOut: Decimal };
  endingBalanceReconciliation: ReconciliationSections & { endingBalance: Decimal };
  payoutTransactions: readonly ClassifiedRecord[];
  endingBalanceTransactions: readonly ClassifiedRecord[];
  warnings: readonly StatementWarning[];
}

export type HealthStatus = 'healthy' | 'degraded';

export interface LoaderHealth {
  company: string;
  status: HealthStatus;
  dataRoot: string | null;
  filesFound: number;
  filesParsed: number;
  rowsRead: number;
  rowsSkipped: number;
  recordCount: number;
  lastParsedAt: string | null;
}

export interface LoadResult {
  company: string;
  records: readonly TransactionRecord[];
  warnings: readonly StatementWarning[];
  health: LoaderHealth;
}

/** Inclusive UTC calendar-day range, `YYYY-MM-DD`. */
export interface DateRange {
  from: string;
  to: string;
}

export const FEE_CATEGORIES = ['Conference', 'Subscription', 'Other'] as const;

export type FeeCategory = (typeof FEE_CATEGORIES)[number];

export interface FeeBucket {
  count: number;
  amount: Decimal;
  fee: Decimal;
  net: Decimal;
}

export interface CompanyFeeBucket extends FeeBucket {
  company: string;
  byCategory: Record<FeeCategory, FeeBucket>;
}

/** Processing fees on settled charges, partitioned by category, export and company. */
export interface FeeSummary {
  range: DateRange;
  currency: string;
  total: FeeBucket;
  byCategory: Record<FeeCategory, FeeBucket>;
  bySource: Record<KnownCsvShape, FeeBucket>;
  byCompany: readonly CompanyFeeBucket[];
  warnings: readonly StatementWarning[];
}

/**
 * Balance movement over a day range of one month, in the processor's
 * balance-summary layout. Fee and payout amounts are zero or negative.
 */
export interface BalanceSummary {
  company: StatementCompany;
  period: Period;
  range: DateRange;
  startingBalance: Decimal;
  startingBalanceSource: OpeningBalanceSource;
  activity: {
    chargeCount: number;
    refundCount: number;
    chargesGross: Decimal;
    refundsGross: Decimal;
    gross: Decimal;
    fee: Decimal;
    net: Decimal;
  };
  adjustments: {
    count: number;
    amount: Decimal;
  };
  payouts: {
    count: number;
    gross: Decimal;
    fee: Decimal;
    net: Decimal;
  };
  endingBalance: Decimal;
  warnings: readonly StatementWarning[];
}

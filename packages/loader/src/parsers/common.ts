import type { Decimal } from 'decimal.js';
import {
  RowParseError,
  errorMessage,
  parseAmount,
  parseOptionalAmount,
  type Company,
  type IdentityCandidates,
  type KnownCsvShape,
  type RecordOrigin,
  type TransactionRecord,
} from '@payout-ledger/types';
import type { CsvRow } from '../csv-reader.js';
import { convertToReporting, type FxRates } from '../fx.js';

export interface ParseContext {
  company: Company;
  /** File name, used in record origins and warnings */
  file: string;
  fxRates: FxRates;
}

/** Turns one CSV row into zero or more records; throws RowParseError to skip the row. */
export type RowParser = (row: CsvRow, ctx: ParseContext) => TransactionRecord[];

export function requireField(row: CsvRow, ...columns: string[]): string {
  const value = row.first(...columns);
  if (value === '') {
    throw new RowParseError(`Missing required value for ${columns.join(' / ')}`);
  }
  return value;
}

export function amountField(row: CsvRow, column: string, required = true): Decimal {
  try {
    return required ? parseAmount(requireField(row, column)) : parseOptionalAmount(row.get(column));
  } catch (error) {
    if (error instanceof RowParseError) throw error;
    throw new RowParseError(`${column}: ${errorMessage(error)}`);
  }
}

export function feeField(row: CsvRow, column: string): Decimal {
  const fee = amountField(row, column, false);
  if (fee.isNegative() && !fee.isZero()) {
    throw new RowParseError(`${column} must not be negative (got ${row.get(column)})`);
  }
  return fee;
}

export function currencyOf(row: CsvRow, ctx: ParseContext, ...columns: string[]): string {
  const raw = row.first(...columns);
  return raw === '' ? ctx.company.currency : raw.toUpperCase();
}

export function toReporting(amount: Decimal, currency: string, ctx: ParseContext): Decimal {
  return convertToReporting(amount, currency, ctx.company.currency, ctx.fxRates);
}

export function originOf(row: CsvRow, ctx: ParseContext, shape: KnownCsvShape): RecordOrigin {
  return { file: ctx.file, row: row.index, shape };
}

export function identityOf(row: CsvRow): IdentityCandidates {
  return {
    customerEmail: row.optional('Customer Email', 'customer_email'),
    metadataEmail: row.optional(
      '2. User email (metadata)',
      'User email (metadata)',
      'email (metadata)',
      'customer_email (metadata)'
    ),
    customerDescription: row.optional('Customer Description', 'customer_description'),
    userId: row.optional('userID (metadata)', 'stripe_user (metadata)', 'user_id (metadata)'),
  };
}

const METADATA_SUFFIX = '(metadata)';

export function metadataOf(row: CsvRow): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [column, value] of row.entries()) {
    if (value !== '' && column.endsWith(METADATA_SUFFIX)) {
      metadata[column] = value;
    }
  }
  return metadata;
}

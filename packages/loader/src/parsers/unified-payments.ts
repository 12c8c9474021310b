import { ZERO, parseOptionalTimestamp, parseTimestamp, RowParseError, type TransactionRecord } from '@payout-ledger/types';
import type { CsvRow } from '../csv-reader.js';
import { normalizeStatus } from '../status.js';
import {
  amountField,
  currencyOf,
  feeField,
  identityOf,
  metadataOf,
  originOf,
  requireField,
  toReporting,
  type ParseContext,
} from './common.js';

function descriptionOf(row: CsvRow): string | null {
  const metadata = [
    row.get('4. Product name (metadata)'),
    row.get('1. Site (metadata)'),
    row.get('5. Type (metadata)'),
  ].filter((part) => part !== '');
  return metadata.length > 0 ? metadata.join(' - ') : row.optional('Description');
}

/**
 * Unified payments export: one row per charge. A refunded amount on the row
 * yields a second, negative record dated at the refund.
 */
export function parseUnifiedPaymentRow(row: CsvRow, ctx: ParseContext): TransactionRecord[] {
  const id = requireField(row, 'id');
  const createdAt = parseTimestamp(requireField(row, 'Created date (UTC)'));

  const converted = row.get('Converted Amount') !== '';
  const currency = converted
    ? currencyOf(row, ctx, 'Converted Currency')
    : currencyOf(row, ctx, 'Currency');
  const gross = toReporting(amountField(row, converted ? 'Converted Amount' : 'Amount'), currency, ctx);
  const fee = toReporting(feeField(row, 'Fee'), currency, ctx);

  const identity = identityOf(row);
  const customerName = row.optional('Customer Name', '3. User name (metadata)');
  const description = descriptionOf(row);
  const origin = originOf(row, ctx, 'unified_payments');

  const charge: TransactionRecord = {
    id,
    company: ctx.company.code,
    createdAt,
    transferDate: parseOptionalTimestamp(row.first('Transfer Date (UTC)', 'Transfer Date')),
    amountGross: gross,
    fee,
    currency: ctx.company.currency,
    status: normalizeStatus(row.get('Status')),
    sourceType: null,
    sourceId: id,
    customerName,
    description,
    identity,
    metadata: metadataOf(row),
    origin,
  };

  const refundedColumn = converted ? 'Converted Amount Refunded' : 'Amount Refunded';
  const refunded = toReporting(amountField(row, refundedColumn, false), currency, ctx).abs();
  if (refunded.isZero()) {
    return [charge];
  }

  const refundDate = row.get('Refunded date (UTC)');
  if (refundDate === '') {
    throw new RowParseError(`${refundedColumn} is set but Refunded date (UTC) is empty`);
  }

  const refund: TransactionRecord = {
    ...charge,
    id: `${id}:refund`,
    createdAt: parseTimestamp(refundDate),
    transferDate: null,
    amountGross: refunded.neg(),
    fee: ZERO,
    status: 'refunded',
    sourceType: 'refund',
    sourceId: null,
  };
  return [charge, refund];
}

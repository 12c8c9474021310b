import { parseOptionalTimestamp, parseTimestamp, type RecordStatus, type TransactionRecord } from '@payout-ledger/types';
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

const REFUND_TYPES = new Set(['refund', 'payment_refund', 'refund_failure']);

function statusOf(row: CsvRow, type: string): RecordStatus {
  if (row.get('Status') !== '') {
    return normalizeStatus(row.get('Status'));
  }
  return REFUND_TYPES.has(type) ? 'refunded' : 'succeeded';
}

/**
 * Balance history export: one row per balance transaction, payouts included.
 */
export function parseBalanceHistoryRow(row: CsvRow, ctx: ParseContext): TransactionRecord[] {
  const id = requireField(row, 'id');
  const type = requireField(row, 'Type').toLowerCase();
  const currency = currencyOf(row, ctx, 'Currency');

  return [
    {
      id,
      company: ctx.company.code,
      createdAt: parseTimestamp(requireField(row, 'Created (UTC)')),
      transferDate: parseOptionalTimestamp(row.first('Transfer Date (UTC)', 'Transfer Date')),
      amountGross: toReporting(amountField(row, 'Amount'), currency, ctx),
      fee: toReporting(feeField(row, 'Fee'), currency, ctx),
      currency: ctx.company.currency,
      status: statusOf(row, type),
      sourceType: type,
      sourceId: row.optional('Source'),
      customerName: row.optional('Customer Name'),
      description: row.optional('Description'),
      identity: identityOf(row),
      metadata: metadataOf(row),
      origin: originOf(row, ctx, 'balance_history'),
    },
  ];
}

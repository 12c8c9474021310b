import { parseOptionalTimestamp, parseTimestamp, type TransactionRecord } from '@payout-ledger/types';
import type { CsvRow } from '../csv-reader.js';
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

const REFUND_CATEGORIES = new Set(['refund', 'refund_failure', 'dispute', 'dispute_reversal']);

/**
 * Itemised balance-change report. `reporting_category` carries the
 * transaction type; the payout date comes from the automatic payout columns.
 */
export function parseItemisedActivityRow(row: CsvRow, ctx: ParseContext): TransactionRecord[] {
  const id = requireField(row, 'balance_transaction_id');
  const category = requireField(row, 'reporting_category').toLowerCase();
  const currency = currencyOf(row, ctx, 'currency');

  return [
    {
      id,
      company: ctx.company.code,
      createdAt: parseTimestamp(requireField(row, 'created_utc', 'created')),
      transferDate: parseOptionalTimestamp(
        row.first('automatic_payout_effective_at_utc', 'automatic_payout_effective_at', 'transfer_date')
      ),
      amountGross: toReporting(amountField(row, 'gross'), currency, ctx),
      fee: toReporting(feeField(row, 'fee'), currency, ctx),
      currency: ctx.company.currency,
      status: REFUND_CATEGORIES.has(category) ? 'refunded' : 'succeeded',
      sourceType: category,
      sourceId: row.optional('source_id', 'charge_id', 'payment_intent_id'),
      customerName: row.optional('customer_name'),
      description: row.optional('description'),
      identity: identityOf(row),
      metadata: metadataOf(row),
      origin: originOf(row, ctx, 'itemised_balance_activity'),
    },
  ];
}

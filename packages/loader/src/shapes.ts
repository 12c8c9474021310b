import type { CsvShape, KnownCsvShape } from '@payout-ledger/types';

interface ShapeSignature {
  shape: KnownCsvShape;
  /** Each group is satisfied by any one of its columns. */
  required: ReadonlyArray<readonly string[]>;
}

/** Checked in order; the first satisfied signature wins. */
export const SHAPE_SIGNATURES: readonly ShapeSignature[] = [
  {
    shape: 'unified_payments',
    required: [['id'], ['Created date (UTC)'], ['Status'], ['Amount', 'Converted Amount']],
  },
  {
    shape: 'balance_history',
    required: [['id'], ['Type'], ['Created (UTC)'], ['Net'], ['Amount']],
  },
  {
    shape: 'itemised_balance_activity',
    required: [['balance_transaction_id'], ['reporting_category'], ['gross'], ['created', 'created_utc']],
  },
];

/** Files are parsed in this order, so on duplicate ids the earlier shape wins. */
export const SHAPE_PRIORITY: Readonly<Record<KnownCsvShape, number>> = {
  unified_payments: 0,
  balance_history: 1,
  itemised_balance_activity: 2,
};

export function detectShape(header: readonly string[]): CsvShape {
  const columns = new Set(header.map((column) => column.trim()));
  const match = SHAPE_SIGNATURES.find((signature) =>
    signature.required.every((group) => group.some((column) => columns.has(column)))
  );
  return match?.shape ?? 'unrecognized';
}

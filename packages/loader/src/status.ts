import type { RecordStatus } from '@payout-ledger/types';

const STATUS_ALIASES: Readonly<Record<string, RecordStatus>> = {
  succeeded: 'succeeded',
  success: 'succeeded',
  paid: 'succeeded',
  available: 'succeeded',
  complete: 'succeeded',
  completed: 'succeeded',
  refunded: 'refunded',
  'partially refunded': 'refunded',
  partially_refunded: 'refunded',
  failed: 'failed',
  fail: 'failed',
  declined: 'failed',
  pending: 'pending',
  incomplete: 'pending',
  requires_action: 'pending',
  processing: 'pending',
  canceled: 'canceled',
  cancelled: 'canceled',
  voided: 'canceled',
};

/** Any value not listed maps to `unknown`. */
export function normalizeStatus(raw: string): RecordStatus {
  return STATUS_ALIASES[raw.trim().toLowerCase()] ?? 'unknown';
}

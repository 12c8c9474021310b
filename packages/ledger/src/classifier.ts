import type { Decimal } from 'decimal.js';
import {
  PAYOUT_PARTY,
  PROCESSOR_NAME,
  type ClassifiedRecord,
  type CustomerIdentity,
  type LedgerPosting,
  type Nature,
  type RecordStatus,
  type Tier,
  type TransactionRecord,
} from '@payout-ledger/types';

/**
 * Tier of a status. Refunded charges stay primary: the charge and the
 * refund are both real movements.
 */
export function tierOf(status: RecordStatus): Tier {
  switch (status) {
    case 'succeeded':
    case 'refunded':
      return 'primary';
    case 'failed':
    case 'pending':
    case 'canceled':
    case 'unknown':
      return 'secondary';
    default: {
      const unreachable: never = status;
      return unreachable;
    }
  }
}

const SOURCE_TYPE_NATURES: Readonly<Record<string, Nature>> = {
  charge: 'payment',
  payment: 'payment',
  payment_intent: 'payment',
  refund: 'refund',
  payment_refund: 'refund',
  chargeback: 'refund',
  refund_failure: 'adjustment',
  payout: 'payout',
  transfer: 'payout',
  payout_failure: 'adjustment',
  payout_cancel: 'adjustment',
  payout_reversal: 'adjustment',
  adjustment: 'adjustment',
  other_adjustment: 'adjustment',
  dispute: 'adjustment',
  dispute_reversal: 'adjustment',
  stripe_fee: 'processing_fee',
  application_fee: 'processing_fee',
  fee: 'processing_fee',
  tax: 'processing_fee',
  network_cost: 'processing_fee',
};

const ID_PREFIX_NATURES: ReadonlyArray<readonly [string, Nature]> = [
  ['po_', 'payout'],
  ['tr_', 'payout'],
  ['re_', 'refund'],
  ['pyr_', 'refund'],
  ['ch_', 'payment'],
  ['py_', 'payment'],
  ['pi_', 'payment'],
];

function natureFromPrefix(identifier: string | null): Nature | undefined {
  if (identifier === null) return undefined;
  return ID_PREFIX_NATURES.find(([prefix]) => identifier.startsWith(prefix))?.[1];
}

/**
 * Resolution order: the explicit source type, then the source identifier's
 * prefix, then the record id's prefix, then a refunded status, and finally
 * the sign of the gross amount.
 */
export function natureOf(record: TransactionRecord): Nature {
  if (record.sourceType !== null) {
    const fromType = SOURCE_TYPE_NATURES[record.sourceType.toLowerCase()];
    if (fromType !== undefined) return fromType;
  }

  const fromPrefix = natureFromPrefix(record.sourceId) ?? natureFromPrefix(record.id);
  if (fromPrefix !== undefined) return fromPrefix;

  if (record.status === 'refunded') return 'refund';
  return record.amountGross.isNegative() ? 'adjustment' : 'payment';
}

/** Signed effect of the gross amount: inflows positive, outflows negative. */
export function signedContribution(record: TransactionRecord, nature: Nature): Decimal {
  switch (nature) {
    case 'payment':
      return record.amountGross.abs();
    case 'refund':
    case 'payout':
    case 'processing_fee':
      return record.amountGross.abs().neg();
    case 'adjustment':
      return record.amountGross;
    default: {
      const unreachable: never = nature;
      return unreachable;
    }
  }
}

function nonEmpty(value: string | null): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Customer identity by priority: explicit email, metadata email, customer
 * description, then a synthesized `User <id>`. The first non-empty wins.
 */
export function resolveCustomerIdentity(record: TransactionRecord): CustomerIdentity {
  const { identity } = record;
  const email = nonEmpty(identity.customerEmail) ?? nonEmpty(identity.metadataEmail);
  const userId = nonEmpty(identity.userId);
  const name = nonEmpty(record.customerName);
  const winner =
    email ?? nonEmpty(identity.customerDescription) ?? (userId !== null ? `User ${userId}` : null);

  return { email, name, party: winner ?? name ?? 'N/A' };
}

export function classifyRecord(record: TransactionRecord): ClassifiedRecord {
  const nature = natureOf(record);
  return {
    record,
    tier: tierOf(record.status),
    nature,
    contribution: signedContribution(record, nature),
    feeContribution: record.fee.neg(),
    customer: resolveCustomerIdentity(record),
  };
}

export function classifyRecords(records: readonly TransactionRecord[]): ClassifiedRecord[] {
  return records.map(classifyRecord);
}

/** Counterparty shown for a posting. */
export function partyOf(posting: LedgerPosting): string {
  if (posting.kind === 'fee' || posting.nature === 'processing_fee') return PROCESSOR_NAME;
  if (posting.nature === 'payout') return PAYOUT_PARTY;
  if (posting.nature === 'adjustment') return PROCESSOR_NAME;
  return posting.source.customer.party;
}

/**
 * Ledger postings for one record: the gross movement, followed by a
 * processing-fee posting when the record carries a fee.
 */
export function postingsFor(classified: ClassifiedRecord): LedgerPosting[] {
  const postings: LedgerPosting[] = [
    { source: classified, kind: 'primary', nature: classified.nature, amount: classified.contribution },
  ];
  if (classified.record.fee.greaterThan(0)) {
    postings.push({
      source: classified,
      kind: 'fee',
      nature: 'processing_fee',
      amount: classified.feeContribution,
    });
  }
  return postings;
}

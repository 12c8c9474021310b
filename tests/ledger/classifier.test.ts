import { describe, it, expect } from 'vitest';
import {
  classifyRecord,
  natureOf,
  partyOf,
  postingsFor,
  resolveCustomerIdentity,
  signedContribution,
  tierOf,
} from '@payout-ledger/ledger';
import { createRecord, dec } from '../helpers/records.js';

describe('tierOf', () => {
  it('should keep succeeded and refunded records primary', () => {
    expect(tierOf('succeeded')).toBe('primary');
    expect(tierOf('refunded')).toBe('primary');
  });

  it('should set everything else aside', () => {
    expect(tierOf('failed')).toBe('secondary');
    expect(tierOf('pending')).toBe('secondary');
    expect(tierOf('canceled')).toBe('secondary');
    expect(tierOf('unknown')).toBe('secondary');
  });
});

describe('natureOf', () => {
  it('should use the source type first', () => {
    expect(natureOf(createRecord({ id: 'txn_1', sourceType: 'payout_failure' }))).toBe('adjustment');
    expect(natureOf(createRecord({ id: 'txn_2', sourceType: 'Stripe_Fee' }))).toBe('processing_fee');
    expect(natureOf(createRecord({ id: 'txn_3', sourceType: 'payout' }))).toBe('payout');
  });

  it('should fall back to identifier prefixes', () => {
    expect(natureOf(createRecord({ id: 'txn_4', sourceType: 'mystery', sourceId: 'po_9' }))).toBe('payout');
    expect(natureOf(createRecord({ id: 're_1' }))).toBe('refund');
    expect(natureOf(createRecord({ id: 'py_1' }))).toBe('payment');
  });

  it('should fall back to the sign of the amount', () => {
    expect(natureOf(createRecord({ id: 'txn_5', amountGross: dec('-5.00'), status: 'refunded' }))).toBe(
      'refund'
    );
    expect(natureOf(createRecord({ id: 'txn_6', amountGross: dec('-5.00') }))).toBe('adjustment');
    expect(natureOf(createRecord({ id: 'txn_7', amountGross: dec('5.00') }))).toBe('payment');
  });
});

describe('classifyRecord', () => {
  it('should sign contributions by nature', () => {
    expect(classifyRecord(createRecord({ amountGross: dec('-100.00') })).contribution.toFixed(2)).toBe('100.00');
    expect(classifyRecord(createRecord({ id: 're_1', amountGross: dec('20.00') })).contribution.toFixed(2)).toBe(
      '-20.00'
    );
    expect(
      classifyRecord(createRecord({ id: 'txn_1', sourceType: 'payout', amountGross: dec('-500.00') }))
        .contribution.toFixed(2)
    ).toBe('-500.00');
    expect(
      classifyRecord(createRecord({ id: 'txn_2', sourceType: 'payout_failure', amountGross: dec('54.35') }))
        .contribution.toFixed(2)
    ).toBe('54.35');
  });

  it('should carry the fee as a negative contribution', () => {
    const classified = classifyRecord(createRecord({ fee: dec('3.55') }));
    expect(classified.feeContribution.toFixed(2)).toBe('-3.55');
    expect(classified.tier).toBe('primary');
    expect(classified.nature).toBe('payment');
  });
});

describe('resolveCustomerIdentity', () => {
  const identity = {
    customerEmail: null,
    metadataEmail: null,
    customerDescription: null,
    userId: null,
  };

  it('should prefer the customer email', () => {
    const record = createRecord({
      identity: { ...identity, customerEmail: 'alice@example.com', metadataEmail: 'other@example.com' },
    });
    expect(resolveCustomerIdentity(record)).toEqual({
      email: 'alice@example.com',
      name: null,
      party: 'alice@example.com',
    });
  });

  it('should skip blank values', () => {
    const record = createRecord({
      identity: { ...identity, customerEmail: '  ', metadataEmail: 'bob.meta@example.com', userId: '1001' },
    });
    expect(resolveCustomerIdentity(record).party).toBe('bob.meta@example.com');
  });

  it('should fall back through description, user id and name', () => {
    expect(
      resolveCustomerIdentity(createRecord({ identity: { ...identity, customerDescription: 'Carol Wong', userId: '7' } }))
        .party
    ).toBe('Carol Wong');
    expect(resolveCustomerIdentity(createRecord({ identity: { ...identity, userId: '1042' } })).party).toBe(
      'User 1042'
    );
    expect(resolveCustomerIdentity(createRecord({ customerName: 'Test Customer' })).party).toBe('Test Customer');
    expect(resolveCustomerIdentity(createRecord()).party).toBe('N/A');
  });
});

describe('postingsFor', () => {
  it('should add a fee posting when the record carries a fee', () => {
    const classified = classifyRecord(
      createRecord({ fee: dec('3.55'), identity: { customerEmail: 'a@example.com', metadataEmail: null, customerDescription: null, userId: null } })
    );
    const postings = postingsFor(classified);

    expect(postings.map((p) => [p.kind, p.nature, p.amount.toFixed(2)])).toEqual([
      ['primary', 'payment', '100.00'],
      ['fee', 'processing_fee', '-3.55'],
    ]);
    expect(postings.map(partyOf)).toEqual(['a@example.com', 'Stripe']);
  });

  it('should post a fee-less record once', () => {
    expect(postingsFor(classifyRecord(createRecord()))).toHaveLength(1);
  });

  it('should name the bank for payouts and the processor for adjustments', () => {
    const [payout] = postingsFor(
      classifyRecord(createRecord({ id: 'txn_1', sourceType: 'payout', amountGross: dec('-10') }))
    );
    const [adjustment] = postingsFor(
      classifyRecord(createRecord({ id: 'txn_2', sourceType: 'adjustment', amountGross: dec('-10') }))
    );
    expect(payout === undefined ? null : partyOf(payout)).toBe('Bank transfer');
    expect(adjustment === undefined ? null : partyOf(adjustment)).toBe('Stripe');
  });
});

describe('signedContribution', () => {
  it('should make payments inflows whatever the raw sign', () => {
    expect(signedContribution(createRecord({ amountGross: dec('-25.00') }), 'payment').toFixed(2)).toBe('25.00');
  });

  it('should make refunds, payouts and fees outflows', () => {
    const record = createRecord({ amountGross: dec('40.00') });
    expect(signedContribution(record, 'refund').toFixed(2)).toBe('-40.00');
    expect(signedContribution(record, 'payout').toFixed(2)).toBe('-40.00');
    expect(signedContribution(record, 'processing_fee').toFixed(2)).toBe('-40.00');
  });

  it('should keep the raw sign of adjustments', () => {
    expect(signedContribution(createRecord({ amountGross: dec('54.35') }), 'adjustment').toFixed(2)).toBe('54.35');
    expect(signedContribution(createRecord({ amountGross: dec('-3.10') }), 'adjustment').toFixed(2)).toBe('-3.10');
  });
});

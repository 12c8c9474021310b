import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { CachedTransactionSource, PACKAGED_DATA_ROOT, TransactionLoader } from '@payout-ledger/loader';
import { classifyRecords, computePeriodTotals } from '@payout-ledger/ledger';
import { TEST_COMPANY } from '../helpers/records.js';

const FIXED_NOW = new Date('2025-08-01T00:00:00.000Z');

const UNIFIED = [
  'id,Created date (UTC),Amount,Fee,Currency,Status,Customer Email,Transfer Date (UTC)',
  'ch_a,2025-07-01 10:00:00,100.00,3.90,hkd,Paid,a@example.com,2025-07-03',
  'ch_b,2025-07-02 10:00:00,not-a-number,1.00,hkd,Paid,b@example.com,2025-07-04',
  'ch_c,2025-07-03 10:00:00,50.00,2.45,hkd,Paid,c@example.com,',
  '',
].join('\n');

const ITEMISED = [
  'balance_transaction_id,created_utc,currency,gross,fee,net,reporting_category,source_id',
  'txn_dup,2025-07-01 10:00:05,hkd,100.00,3.90,96.10,charge,ch_a',
  'txn_new,2025-07-20 10:00:00,hkd,30.00,1.87,28.13,charge,ch_d',
  '',
].join('\n');

describe('TransactionLoader', () => {
  let root: string;

  beforeEach(async () => {
    root = join(tmpdir(), `ledger-load-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(root, 'cgge'), { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const loaderFor = (dataRoot: string | null) =>
    new TransactionLoader({ dataRoot, cwd: root, fallbackRoot: null, now: () => FIXED_NOW });

  it('should load records and report skipped rows as warnings', async () => {
    await writeFile(join(root, 'cgge', 'payments.csv'), UNIFIED);

    const result = await loaderFor(root).load(TEST_COMPANY);

    expect(result.records.map((r) => r.id)).toEqual(['ch_a', 'ch_c']);
    expect(result.warnings).toEqual([
      {
        code: 'ROW_PARSE_ERROR',
        message: 'Amount: Unable to parse amount: "not-a-number"',
        file: 'payments.csv',
        row: 2,
      },
    ]);
    expect(result.health).toEqual({
      company: 'cgge',
      status: 'healthy',
      dataRoot: root,
      filesFound: 1,
      filesParsed: 1,
      rowsRead: 3,
      rowsSkipped: 1,
      recordCount: 2,
      lastParsedAt: '2025-08-01T00:00:00.000Z',
    });
  });

  it('should keep the first record per charge across files', async () => {
    await writeFile(join(root, 'cgge', 'a_activity.csv'), ITEMISED);
    await writeFile(join(root, 'cgge', 'z_payments.csv'), UNIFIED);

    const result = await loaderFor(root).load(TEST_COMPANY);

    // unified exports are read first whatever the file name
    expect(result.records.map((r) => r.id)).toEqual(['ch_a', 'ch_c', 'txn_new']);
    expect(result.records[0]?.origin.shape).toBe('unified_payments');
  });

  it('should keep a payout and its reversal that share a source', async () => {
    await writeFile(
      join(root, 'cgge', 'balance_history.csv'),
      [
        'id,Type,Source,Amount,Fee,Net,Currency,Created (UTC),Transfer Date (UTC)',
        'txn_po0630,payout,po_jun30,-54.35,0.00,-54.35,hkd,2025-06-30 09:00:00,2025-06-30 09:00:00',
        'txn_pf0718,payout_failure,po_jun30,54.35,0.00,54.35,hkd,2025-07-18 08:00:00,2025-07-18 08:00:00',
        '',
      ].join('\n')
    );

    const result = await loaderFor(root).load(TEST_COMPANY);

    expect(result.records.map((r) => r.id)).toEqual(['txn_po0630', 'txn_pf0718']);
    expect(result.health.rowsSkipped).toBe(0);

    const july = classifyRecords(result.records.filter((r) => r.createdAt.startsWith('2025-07')));
    expect(computePeriodTotals(july).adjustments.toFixed(2)).toBe('54.35');
  });

  it('should count a refund once when both unified and balance exports list it', async () => {
    await writeFile(
      join(root, 'cgge', 'payments.csv'),
      [
        'id,Created date (UTC),Amount,Amount Refunded,Fee,Currency,Status,Refunded date (UTC)',
        'ch_1,2025-07-02 10:00:00,100.00,100.00,3.00,hkd,Refunded,2025-07-10 12:00:00',
        '',
      ].join('\n')
    );
    await writeFile(
      join(root, 'cgge', 'balance_history.csv'),
      [
        'id,Type,Source,Amount,Fee,Net,Currency,Created (UTC),Transfer Date (UTC)',
        'txn_ch1,charge,ch_1,100.00,3.00,97.00,hkd,2025-07-02 10:00:05,',
        'txn_re1,refund,re_1,-100.00,0.00,-100.00,hkd,2025-07-10 12:00:05,',
        '',
      ].join('\n')
    );

    const result = await loaderFor(root).load(TEST_COMPANY);

    expect(result.records.map((r) => r.id)).toEqual(['ch_1', 'txn_re1']);
    expect(result.health.rowsRead).toBe(3);
    expect(result.health.rowsSkipped).toBe(2);

    const totals = computePeriodTotals(classifyRecords(result.records));
    expect(totals.counts.refunds).toBe(1);
    expect(totals.grossActivity.toFixed(2)).toBe('0.00');
  });

  it('should keep unified refunds for months no balance export covers', async () => {
    await writeFile(
      join(root, 'cgge', 'payments.csv'),
      [
        'id,Created date (UTC),Amount,Amount Refunded,Fee,Currency,Status,Refunded date (UTC)',
        'ch_2,2025-06-05 10:00:00,80.00,80.00,2.00,hkd,Refunded,2025-06-20 09:00:00',
        '',
      ].join('\n')
    );
    await writeFile(
      join(root, 'cgge', 'balance_history.csv'),
      [
        'id,Type,Source,Amount,Fee,Net,Currency,Created (UTC),Transfer Date (UTC)',
        'txn_po0731,payout,po_jul31,-10.00,0.00,-10.00,hkd,2025-07-31 09:00:00,2025-07-31 09:00:00',
        '',
      ].join('\n')
    );

    const result = await loaderFor(root).load(TEST_COMPANY);

    expect(result.records.map((r) => r.id)).toEqual(['ch_2', 'ch_2:refund', 'txn_po0731']);
  });

  it('should warn about files with an unknown layout', async () => {
    await writeFile(join(root, 'cgge', 'payments.csv'), UNIFIED);
    await writeFile(join(root, 'cgge', 'notes.csv'), 'Date,Memo\n2025-07-01,hello\n');

    const result = await loaderFor(root).load(TEST_COMPANY);

    expect(result.warnings[0]).toEqual({
      code: 'UNRECOGNIZED_FILE',
      message: 'Unrecognized CSV layout in notes.csv',
      file: 'notes.csv',
    });
    expect(result.health.filesFound).toBe(2);
    expect(result.health.filesParsed).toBe(1);
    expect(result.health.status).toBe('healthy');
  });

  it('should degrade when no data root exists', async () => {
    const result = await loaderFor(join(root, 'missing')).load(TEST_COMPANY);

    expect(result.records).toEqual([]);
    expect(result.health.status).toBe('degraded');
    expect(result.health.dataRoot).toBeNull();
    expect(result.warnings).toEqual([
      { code: 'DATA_SOURCE_UNAVAILABLE', message: 'No data root found for cgge' },
    ]);
  });

  it('should fall back to the sample exports shipped with the package', async () => {
    const loader = new TransactionLoader({ cwd: root, now: () => FIXED_NOW });
    const institute = { ...TEST_COMPANY, code: 'ki', directory: 'krystal_institute', filePrefixes: ['ki_'] };

    const result = await loader.load(institute);

    expect(result.health.dataRoot).toBe(PACKAGED_DATA_ROOT);
    expect(result.records.map((r) => r.id)).toEqual([
      'ch_sample01',
      'ch_sample02',
      'ch_sample03',
      'ch_sample03:refund',
      'ch_sample04',
    ]);
  });

  it('should degrade when the company has no exports', async () => {
    const result = await loaderFor(root).load(TEST_COMPANY);

    expect(result.health.status).toBe('degraded');
    expect(result.warnings[0]?.code).toBe('DATA_SOURCE_UNAVAILABLE');
    expect(result.warnings[0]?.message).toBe(`No CSV exports for cgge under ${root}`);
  });
});

describe('CachedTransactionSource', () => {
  let root: string;

  beforeEach(async () => {
    root = join(tmpdir(), `ledger-cache-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(root, 'cgge'), { recursive: true });
    await writeFile(join(root, 'cgge', 'payments.csv'), UNIFIED);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const sourceFor = () =>
    new CachedTransactionSource(new TransactionLoader({ dataRoot: root, fallbackRoot: null }));

  it('should reuse the result while files are unchanged', async () => {
    const source = sourceFor();
    const first = await source.load(TEST_COMPANY);
    const second = await source.load(TEST_COMPANY);
    expect(second).toBe(first);
  });

  it('should share one load between concurrent callers', async () => {
    const source = sourceFor();
    const [a, b] = await Promise.all([source.load(TEST_COMPANY), source.load(TEST_COMPANY)]);
    expect(a).toBe(b);
  });

  it('should reload when a file is added', async () => {
    const source = sourceFor();
    const first = await source.load(TEST_COMPANY);
    await writeFile(join(root, 'cgge', 'activity.csv'), ITEMISED);
    const second = await source.load(TEST_COMPANY);
    expect(second).not.toBe(first);
    expect(second.records).toHaveLength(3);
  });

  it('should reload after invalidation', async () => {
    const source = sourceFor();
    const first = await source.load(TEST_COMPANY);
    source.invalidate('cgge');
    const second = await source.load(TEST_COMPANY);
    expect(second).not.toBe(first);
    expect(second.records.map((r) => r.id)).toEqual(first.records.map((r) => r.id));
  });
});

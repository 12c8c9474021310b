import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { scanCompanyFiles, scanDirectoryForCsvs, validateDirectory } from '@payout-ledger/loader';
import { TEST_COMPANY } from '../helpers/records.js';

describe('directory-scanner', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `ledger-scan-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('validateDirectory', () => {
    it('should return valid for existing directory', async () => {
      const result = await validateDirectory(testDir);
      expect(result.valid).toBe(true);
      expect(result.error).toBeUndefined();
    });

    it('should return invalid for non-existent directory', async () => {
      const result = await validateDirectory(join(testDir, 'nonexistent'));
      expect(result.valid).toBe(false);
      expect(result.error).toContain('does not exist');
    });

    it('should return invalid for file path', async () => {
      const filePath = join(testDir, 'file.txt');
      await writeFile(filePath, 'test');
      const result = await validateDirectory(filePath);
      expect(result.valid).toBe(false);
      expect(result.error).toContain('not a directory');
    });
  });

  describe('scanDirectoryForCsvs', () => {
    it('should find CSV files sorted by name', async () => {
      await writeFile(join(testDir, 'b-august.csv'), 'id\n1');
      await writeFile(join(testDir, 'a-july.CSV'), 'id\n1');
      await writeFile(join(testDir, 'readme.txt'), 'not a csv');

      const result = await scanDirectoryForCsvs(testDir);

      expect(result.files.map((f) => f.fileName)).toEqual(['a-july.CSV', 'b-august.csv']);
      expect(result.files[0]?.sizeBytes).toBe(4);
    });

    it('should skip temporary, backup and empty files', async () => {
      await writeFile(join(testDir, '~$open.csv'), 'id\n1');
      await writeFile(join(testDir, '.hidden.csv'), 'id\n1');
      await writeFile(join(testDir, 'payments_backup.csv'), 'id\n1');
      await writeFile(join(testDir, 'empty.csv'), '');
      await writeFile(join(testDir, 'good.csv'), 'id\n1');

      const result = await scanDirectoryForCsvs(testDir);

      expect(result.files.map((f) => f.fileName)).toEqual(['good.csv']);
      expect(result.skipped).toHaveLength(4);
      expect(result.skipped.find((s) => s.fileName === 'empty.csv')?.reason).toBe('Zero-byte file');
      expect(result.skipped.find((s) => s.fileName === 'payments_backup.csv')?.reason).toBe('Backup copy');
    });

    it('should filter by prefix case-insensitively', async () => {
      await writeFile(join(testDir, 'CGGE_payments.csv'), 'id\n1');
      await writeFile(join(testDir, 'ki_payments.csv'), 'id\n1');

      const result = await scanDirectoryForCsvs(testDir, { prefixes: ['cgge_'] });

      expect(result.files.map((f) => f.fileName)).toEqual(['CGGE_payments.csv']);
    });

    it('should ignore subdirectories', async () => {
      await mkdir(join(testDir, 'nested.csv'));
      const result = await scanDirectoryForCsvs(testDir);
      expect(result.files).toHaveLength(0);
    });
  });

  describe('scanCompanyFiles', () => {
    it('should merge the company directory and prefixed root files', async () => {
      await mkdir(join(testDir, 'cgge'));
      await writeFile(join(testDir, 'cgge', 'payments.csv'), 'id\n1');
      await writeFile(join(testDir, 'cgge_history.csv'), 'id\n1');
      await writeFile(join(testDir, 'kt_history.csv'), 'id\n1');

      const result = await scanCompanyFiles(testDir, TEST_COMPANY);

      expect(result.files.map((f) => f.fileName)).toEqual(['cgge_history.csv', 'payments.csv']);
    });

    it('should work without a company directory', async () => {
      await writeFile(join(testDir, 'cgge_history.csv'), 'id\n1');
      const result = await scanCompanyFiles(testDir, TEST_COMPANY);
      expect(result.files.map((f) => f.fileName)).toEqual(['cgge_history.csv']);
    });
  });
});

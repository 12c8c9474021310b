import { readdir, stat } from 'fs/promises';
import { join, extname, normalize } from 'path';
import type { Company } from '@payout-ledger/types';
import { BACKUP_FILE_SUFFIX } from '@payout-ledger/types';

export interface CsvFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface ScanResult {
  files: CsvFileInfo[];
  skipped: SkippedFile[];
  directoryPath: string;
}

export interface ScanOptions {
  /** Only keep files whose lower-cased name starts with one of these. */
  prefixes?: readonly string[];
}

function byFileName(a: CsvFileInfo, b: CsvFileInfo): number {
  return a.fileName.localeCompare(b.fileName) || a.filePath.localeCompare(b.filePath);
}

/**
 * Scans a directory for CSV exports, filtering out temporary, backup and
 * empty files. Returns files sorted by filename ascending.
 */
export async function scanDirectoryForCsvs(
  directoryPath: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });
  const prefixes = options.prefixes?.map((prefix) => prefix.toLowerCase());

  const files: CsvFileInfo[] = [];
  const skipped: SkippedFile[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }

    const fileName = entry.name;
    const lowerName = fileName.toLowerCase();
    if (extname(lowerName) !== '.csv') {
      continue;
    }
    if (prefixes !== undefined && !prefixes.some((prefix) => lowerName.startsWith(prefix))) {
      continue;
    }

    if (fileName.startsWith('~$') || fileName.startsWith('.')) {
      skipped.push({ fileName, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }
    if (lowerName.endsWith(BACKUP_FILE_SUFFIX)) {
      skipped.push({ fileName, reason: 'Backup copy' });
      continue;
    }

    const filePath = join(normalizedPath, fileName);
    const fileStat = await stat(filePath);

    if (fileStat.size === 0) {
      skipped.push({ fileName, reason: 'Zero-byte file' });
      continue;
    }

    files.push({
      filePath,
      fileName,
      sizeBytes: fileStat.size,
      modifiedAt: fileStat.mtime,
    });
  }

  files.sort(byFileName);

  return {
    files,
    skipped,
    directoryPath: normalizedPath,
  };
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(
  directoryPath: string
): Promise<{ valid: boolean; error?: string }> {
  try {
    const dirStat = await stat(normalize(directoryPath));
    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${directoryPath}` };
    }
    return { valid: true };
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return { valid: false, error: `Directory does not exist: ${directoryPath}` };
    }
    if (code === 'EACCES') {
      return { valid: false, error: `Permission denied: ${directoryPath}` };
    }
    return { valid: false, error: `Cannot access directory: ${directoryPath}` };
  }
}

/**
 * Every export belonging to a company: all CSVs in `<root>/<directory>/`
 * plus prefixed CSVs such as `<root>/cgge_payments.csv` lying directly in
 * the root.
 */
export async function scanCompanyFiles(root: string, company: Company): Promise<ScanResult> {
  const files: CsvFileInfo[] = [];
  const skipped: SkippedFile[] = [];

  const companyDir = join(root, company.directory);
  if ((await validateDirectory(companyDir)).valid) {
    const inDirectory = await scanDirectoryForCsvs(companyDir);
    files.push(...inDirectory.files);
    skipped.push(...inDirectory.skipped);
  }

  const atRoot = await scanDirectoryForCsvs(root, { prefixes: company.filePrefixes });
  const seen = new Set(files.map((file) => file.filePath));
  files.push(...atRoot.files.filter((file) => !seen.has(file.filePath)));
  skipped.push(...atRoot.skipped);

  files.sort(byFileName);
  return { files, skipped, directoryPath: normalize(root) };
}

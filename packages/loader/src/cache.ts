import type { Company, LoadResult } from '@payout-ledger/types';
import type { TransactionLoader, TransactionSource } from './transaction-loader.js';

interface CacheEntry {
  fingerprint: string;
  result: LoadResult;
}

/**
 * Memoizes loads per company. An entry is reused while the set of files and
 * their sizes and modification times is unchanged. Concurrent loads of the
 * same company share one in-flight promise.
 */
export class CachedTransactionSource implements TransactionSource {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<LoadResult>>();

  constructor(private readonly loader: TransactionLoader) {}

  load(company: Company): Promise<LoadResult> {
    const pending = this.inFlight.get(company.code);
    if (pending !== undefined) {
      return pending;
    }

    const loading = this.revalidate(company).finally(() => {
      this.inFlight.delete(company.code);
    });
    this.inFlight.set(company.code, loading);
    return loading;
  }

  invalidate(companyCode?: string): void {
    if (companyCode === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(companyCode);
    }
  }

  private async fingerprint(company: Company): Promise<string> {
    const listing = await this.loader.listFiles(company);
    const files = listing.files.map(
      (file) => `${file.filePath}:${file.sizeBytes}:${file.modifiedAt.getTime()}`
    );
    return [listing.root ?? '-', ...files].join('|');
  }

  private async revalidate(company: Company): Promise<LoadResult> {
    const fingerprint = await this.fingerprint(company);
    const cached = this.entries.get(company.code);
    if (cached !== undefined && cached.fingerprint === fingerprint) {
      return cached.result;
    }

    const result = await this.loader.load(company);
    this.entries.set(company.code, { fingerprint, result });
    return result;
  }
}

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DATA_ROOT_CONVENTIONS, silentLogger, type Logger } from '@payout-ledger/types';
import { validateDirectory } from './directory-scanner.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Sample exports shipped beside the package. */
export const PACKAGED_DATA_ROOT = resolve(__dirname, '../data');

export interface DataRootOptions {
  explicit?: string | null;
  cwd?: string;
  fallback?: string | null;
  logger?: Logger;
}

export interface DataRootResolution {
  path: string | null;
  tried: string[];
}

/**
 * Candidate roots in priority order: the configured path, the working
 * directory conventions, then the packaged fallback.
 */
export function candidateDataRoots(options: DataRootOptions = {}): string[] {
  const cwd = options.cwd ?? process.cwd();
  const candidates: string[] = [];

  if (options.explicit !== undefined && options.explicit !== null) {
    candidates.push(resolve(cwd, options.explicit));
  }
  for (const convention of DATA_ROOT_CONVENTIONS) {
    candidates.push(resolve(cwd, convention));
  }
  const fallback = options.fallback === undefined ? PACKAGED_DATA_ROOT : options.fallback;
  if (fallback !== null) {
    candidates.push(fallback);
  }

  return [...new Set(candidates)];
}

export async function resolveDataRoot(options: DataRootOptions = {}): Promise<DataRootResolution> {
  const logger = options.logger ?? silentLogger;
  const candidates = candidateDataRoots(options);
  const tried: string[] = [];

  for (const candidate of candidates) {
    tried.push(candidate);
    const check = await validateDirectory(candidate);
    if (check.valid) {
      logger.debug(`Using data root ${candidate}`);
      return { path: candidate, tried };
    }
    if (tried.length === 1 && options.explicit !== undefined && options.explicit !== null) {
      logger.warn(`Configured data root unavailable (${check.error ?? candidate}); trying fallbacks`);
    }
  }

  return { path: null, tried };
}

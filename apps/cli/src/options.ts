import { ConfigError, type LedgerConfig } from '@payout-ledger/types';

export interface GlobalOptions {
  dataRoot?: string;
  companiesFile?: string;
  verbose: boolean;
  cache: boolean;
}

/** Where commander took an option's value from (`'default'`, `'env'`, `'cli'`...). */
export type OptionSource = string | undefined;

/**
 * Flags that override the environment. `--no-cache` leaves `cache` at true
 * when absent, so it only counts when given on the command line.
 */
export function configOverrides(globals: GlobalOptions, cacheSource: OptionSource): Partial<LedgerConfig> {
  const overrides: Partial<LedgerConfig> = { verbose: globals.verbose };
  if (cacheSource === 'cli') overrides.cache = globals.cache;
  if (globals.dataRoot !== undefined) overrides.dataRoot = globals.dataRoot;
  if (globals.companiesFile !== undefined) overrides.companiesFile = globals.companiesFile;
  return overrides;
}

/** Day-of-month flag; absent stays undefined. */
export function parseDay(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d{1,2}$/.test(value.trim())) {
    throw new ConfigError(`${flag} must be a day of the month, got "${value}"`);
  }
  return Number(value.trim());
}

/** Comma-separated company codes; absent or blank means every company. */
export function parseCompanyList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const codes = value
    .split(',')
    .map((code) => code.trim())
    .filter((code) => code !== '');
  return codes.length === 0 ? undefined : codes;
}

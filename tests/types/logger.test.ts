import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, silentLogger } from '@payout-ledger/types';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write level-tagged lines to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger();

    logger.info('Loaded 3 files');
    logger.warn('Skipped 1 row');

    expect(spy.mock.calls).toEqual([['[INFO] Loaded 3 files'], ['[WARN] Skipped 1 row']]);
  });

  it('should only print debug lines when verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createConsoleLogger().debug('hidden');
    createConsoleLogger({ verbose: true }).debug('shown');

    expect(spy.mock.calls).toEqual([['[DEBUG] shown']]);
  });
});

describe('silentLogger', () => {
  it('should write nothing', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    silentLogger.error('ignored');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});

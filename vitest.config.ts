import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@payout-ledger/types': fromRoot('./packages/types/src/index.ts'),
      '@payout-ledger/loader': fromRoot('./packages/loader/src/index.ts'),
      '@payout-ledger/ledger': fromRoot('./packages/ledger/src/index.ts'),
      '@payout-ledger/output': fromRoot('./packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});

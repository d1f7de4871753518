import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/cli/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
  resolve: {
    alias: {
      '@tessera/types': pkg('./packages/types/src/index.ts'),
      '@tessera/crypto': pkg('./packages/crypto/src/index.ts'),
      '@tessera/merkle': pkg('./packages/merkle/src/index.ts'),
      '@tessera/circuits': pkg('./packages/circuits/src/index.ts'),
      '@tessera/ledger': pkg('./packages/ledger/src/index.ts'),
    },
  },
});

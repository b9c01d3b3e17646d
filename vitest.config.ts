import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
      'apps/*/test/**/*.test.ts',
      'apps/*/test/**/*.integration.ts',
    ],
    testTimeout: 15000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: [
      {
        find: /^@tooth-ledger\/shared$/,
        replacement: fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      },
      {
        find: '@tooth-ledger/shared',
        replacement: fileURLToPath(new URL('./packages/shared/src', import.meta.url)),
      },
    ],
  },
});

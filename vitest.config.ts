import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases for root-level tests
      '@epcqr/checksum': `${root}packages/checksum/src/index.ts`,
      '@epcqr/schema': `${root}packages/schema/src/index.ts`,
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/__tests__/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
    // Fail fast on first error in CI
    bail: process.env.CI ? 1 : 0,
  },
});

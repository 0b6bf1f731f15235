import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'tests/integration/**/*.integration.test.ts',
    ],
    testTimeout: 20_000,
  },
  resolve: {
    alias: {
      '@bankdw/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@bankdw/api': fileURLToPath(new URL('./packages/api/src/server.ts', import.meta.url)),
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // WASM grammar load dominates the first test in each file
    testTimeout: 20_000,
  },
});

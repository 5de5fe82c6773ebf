import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // PGlite boots a WASM Postgres per test context
    hookTimeout: 30000,
    testTimeout: 30000,
  },
});

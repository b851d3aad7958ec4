import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    testTimeout: 15000,

    // Route tests run against a mocked pg Pool, so nothing here needs a live
    // database and files can run in parallel.
    fileParallelism: true,

    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules/**', '**/node_modules/**', 'dist/**'],

    // setup-api.ts provides the JWT secret used by signTestJwt()
    setupFiles: ['./tests/setup-api.ts'],
  },
});

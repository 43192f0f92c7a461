import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Setup file for global mocks
    setupFiles: ['./test/setup.ts'],

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,

    pool: 'threads',
  },
});

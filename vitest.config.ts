import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Global test timeout
    testTimeout: 30000,
    hookTimeout: 30000,

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Global variables
    globals: true,

    pool: 'threads',
    sequence: {
      concurrent: false,
    },

    // Environment variables
    env: {
      NODE_ENV: 'test',
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Setup file for environment variables
    setupFiles: ['./test/setup.ts'],
    // Use threads for better isolation
    pool: 'threads',
    // Timeout for slow tests
    testTimeout: 30000,
    include: ['test/**/*.test.ts'],
  },
});

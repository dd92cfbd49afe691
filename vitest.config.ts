/**
 * ABOUTME: Vitest configuration for the loopbench test suite.
 * Tests live under tests/ and spawn real child processes, so timeouts are generous.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
    hookTimeout: 20_000,
    pool: 'forks',
  },
});

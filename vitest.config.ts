/**
 * Vitest configuration for workbank-analysis
 *
 * Unit tests live under tests/unit and run in Node. Nothing reaches the
 * network: the remote dataset is replaced with a fake fetch in every test.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },
  },
})

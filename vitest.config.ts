import { defineConfig } from 'vitest/config'

/**
 * Vitest configuration
 *
 * Tests live beside their sources as *.test.ts; cross-module scenarios
 * live in tests/. Engine logging is limited to errors during runs.
 */
export default defineConfig({
  test: {
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    testTimeout: 10_000,
    env: {
      FLAGWISE_LOG_LEVEL: 'error',
    },
  },
})

import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for ini-roundtrip
 *
 * Tests live in `__tests__/` directories beside the sources.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});

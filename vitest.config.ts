import { defineConfig } from 'vitest/config';

/**
 * Unit tests only: nothing here touches a database, the network or the
 * platform client.
 */
export default defineConfig({
  test: {
    name: 'unit',
    globals: true,
    testTimeout: 15000,
    fileParallelism: true,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', '**/node_modules/**', 'dist/**'],
  },
});

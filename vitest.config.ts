import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    // better-sqlite3 is a native addon; keep each file in its own process
    pool: 'forks',
    testTimeout: 10000,
  },
});

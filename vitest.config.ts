import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'server/src/**/*.test.ts'],
    // Tests spawn stub engine processes; keep each file in its own process
    pool: 'forks',
    testTimeout: 20000,
    hookTimeout: 20000,
  },
});

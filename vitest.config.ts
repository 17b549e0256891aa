import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['quarter-tracker/tests/**/*.test.ts'],
    testTimeout: 15_000,
  },
});

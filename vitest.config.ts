import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/tests/**/*.test.ts', 'agent/tests/**/*.test.ts'],
    testTimeout: 10_000,
    restoreMocks: true,
  },
});

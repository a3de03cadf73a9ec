import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts', 'services/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});

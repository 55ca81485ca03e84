import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 15_000,
    env: {
      VV_LOG_LEVEL: 'silent',
    },
  },
});

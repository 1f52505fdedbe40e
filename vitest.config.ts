import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    env: {
      CALLCOACH_LOG_LEVEL: 'error',
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    teardownTimeout: 10000,
    restoreMocks: true,
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    env: {
      KUBETEST_LOG_LEVEL: 'silent',
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'services/*/src/**/*.test.ts'],
    setupFiles: ['services/analytics/src/test/setup-env.ts'],
  },
});

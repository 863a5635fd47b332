import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.spec.ts'],
    setupFiles: ['packages/core/tests/setup.ts'],
    env: {
      WIRELOOM_LOG_LEVEL: 'silent',
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/formpilot/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      NODE_ENV: 'test',
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      JWT_ACCESS_SECRET: 'test-secret',
      APP_URL: 'http://localhost:5173',
    },
    testTimeout: 10000,
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/**/*.test.ts'],
    environment: 'node',
    // forge key generation is pure JS
    testTimeout: 20000,
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});

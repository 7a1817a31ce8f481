import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core-service/test/**/*.test.ts', 'access-engine/test/**/*.test.ts', 'auth-service/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
  },
});

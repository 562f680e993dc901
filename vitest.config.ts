import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/**/__tests__/**/*.test.ts', 'services/**/__tests__/**/*.test.ts'],
    testTimeout: 20000,
  },
});

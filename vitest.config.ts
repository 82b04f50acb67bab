import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/**/__tests__/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['__tests__/**/*.{test,spec}.ts', 'services/**/*.test.ts', 'server/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});

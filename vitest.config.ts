import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    env: {
      LOG_FILE: '',
      LOG_LEVEL: 'warn',
    },
  },
});

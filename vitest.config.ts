import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'unit',
    globals: true,
    environment: 'node',
    include: [
      'core/src/__tests__/**/*.unit.test.ts',
      'config/src/__tests__/**/*.unit.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});

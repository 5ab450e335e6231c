import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages expose their TypeScript sources under the "source" condition
    conditions: ['source'],
  },
  test: {
    pool: 'forks',
    env: { LOG_LEVEL: 'silent' },
    include: ['packages/*/__tests__/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});

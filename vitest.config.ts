import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration. Runs the tests of every workspace package.
 */
export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
  },
});

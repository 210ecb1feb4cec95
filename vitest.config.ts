import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration for the whole monorepo.
 * Workspace packages are resolved to their TypeScript sources so no build is needed.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@minivcs/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/*.d.ts', '**/*.config.ts', '**/__tests__/**', 'apps/cli/tests/**'],
    },
    testTimeout: 30000,
    reporters: ['default'],
  },
});

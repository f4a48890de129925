import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
      'packages/**/tests/e2e/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts'],
    },
  },
  resolve: {
    alias: {
      '@strata/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@strata/core': resolveFromRoot('packages/core/src/index.ts'),
      '@strata/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@strata/lab': resolveFromRoot('packages/lab/src/index.ts'),
      '@strata/jobs': resolveFromRoot('packages/jobs/src/index.ts'),
    },
  },
});

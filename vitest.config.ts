import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./.github/vitest.setup.ts'],
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Real-git tests spawn processes and change process-wide spies
    fileParallelism: false,
    testTimeout: 30000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/index.ts', // Re-exports only
        'packages/*/src/types.ts', // Type definitions only
        'packages/cli/src/bin.ts', // CLI entry point
        'packages/git/src/test-helpers.ts',
      ],
    },
  },
});

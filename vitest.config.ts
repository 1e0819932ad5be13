import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

// Workspace packages resolve to dist/ at runtime; tests run against their sources
function source(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@crateflow/utils': source('./packages/utils/src/index.ts'),
      '@crateflow/config': source('./packages/config/src/index.ts'),
      '@crateflow/core': source('./packages/core/src/index.ts'),
      '@crateflow/cli': source('./packages/cli/src/program.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/*/test/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    // Checkpoint and workspace tests share temp directories and process.env
    fileParallelism: false,
    testTimeout: 30000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/index.ts',  // Re-exports only
        'packages/*/src/types.ts',   // Type definitions only
        'packages/cli/src/bin.ts',  // CLI entry point
      ],
    },
  },
});

import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@switchyard/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@switchyard/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@switchyard/tools': path.resolve(root, 'packages/tools/src/index.ts'),
      '@switchyard/runtime': path.resolve(root, 'packages/runtime/src/index.ts'),
    },
  },
});

import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'workers/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    },
    testTimeout: 20000
  },
  resolve: {
    alias: {
      '@imagefind/core': path.resolve(__dirname, 'packages/imagefind-core/src'),
      '@imagefind/test-utils': path.resolve(__dirname, 'packages/imagefind-test-utils/src'),
      '@imagefind/indexer': path.resolve(__dirname, 'workers/indexer/src/lib.ts')
    }
  }
});

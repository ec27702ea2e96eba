import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@quarry/types': packageSource('types'),
      '@quarry/core': packageSource('core'),
      '@quarry/language': packageSource('language'),
      '@quarry/fetcher': packageSource('fetcher'),
      '@quarry/store': packageSource('store'),
      '@quarry/test-utils': packageSource('test-utils'),
      '@quarry/cli': packageSource('cli'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000,
  },
});

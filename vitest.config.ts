import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@window-guard/core': packageSource('core'),
      '@window-guard/store-memory': packageSource('store-memory'),
      '@window-guard/store-sqlite': packageSource('store-sqlite'),
      '@window-guard/store-dynamodb': packageSource('store-dynamodb'),
      '@window-guard/server': packageSource('server'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});

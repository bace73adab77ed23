import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tilecrawl/protocol': source('./packages/protocol/src/index.ts'),
      '@tilecrawl/world': source('./packages/world/src/index.ts'),
      '@tilecrawl/render': source('./packages/render/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});

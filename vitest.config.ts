import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@riverwatch/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      '@riverwatch/simulator': fileURLToPath(new URL('./packages/simulator/src/feed-server.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/*.spec.ts', 'packages/*/src/**/__tests__/*.spec.tsx'],
    testTimeout: 10000,
  },
});

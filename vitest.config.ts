import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    include: [
      'packages/**/src/**/*.{test,spec}.ts',
      'examples/**/src/**/*.{test,spec}.ts',
    ],
    environment: 'node',
    globals: true,          // allows describe/it without importing
    isolate: false,         // share Vite context across tests (faster, avoids some module issues)
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
    },
  },
  resolve: {
    alias: {
      '@totalscan/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
});

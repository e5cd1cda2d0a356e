import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.test.ts', '**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
  },
  resolve: {
    alias: {
      '@dishwatch/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@dishwatch/monitoring': fileURLToPath(new URL('./packages/monitoring/src/index.ts', import.meta.url)),
    },
  },
});

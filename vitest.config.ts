import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (rel: string) => fileURLToPath(new URL(rel, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@crr-pricer/core-types': src('./packages/core-types/src/index.ts'),
      '@crr-pricer/crr-core': src('./packages/crr-core/src/index.ts'),
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ]
  },
});

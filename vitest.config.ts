import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tubecompare/core-types': path.resolve(root, 'packages/core-types/src/index.ts'),
      '@tubecompare/tube-core': path.resolve(root, 'packages/tube-core/src/index.ts'),
      '@tubecompare/tube-io': path.resolve(root, 'packages/tube-io/src/index.ts'),
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/tests/**/*.test.ts',
      'apps/*/src/__tests__/**/*.{test,spec}.ts',
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ]
  },
});

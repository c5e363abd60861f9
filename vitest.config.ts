import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts', 'apps/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@wavefront/shared': path.resolve(__dirname, './packages/shared/src/index.ts'),
      '@wavefront/engine': path.resolve(__dirname, './packages/engine/lib/index.ts'),
    },
  },
});

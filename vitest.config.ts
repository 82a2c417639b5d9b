import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['lib/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },

  // Path aliases matching tsconfig
  resolve: {
    alias: {
      '@': rootDir,
    },
  },
});

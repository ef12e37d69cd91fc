import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['shared/tests/**/*.{test,spec}.ts', 'tests/**/*.{test,spec}.ts'],
    restoreMocks: true,
    env: {
      LOG_LEVEL: 'WARN',
    },
  },
  resolve: {
    alias: {
      '@shared': resolve(rootDir, 'shared'),
      '@server': resolve(rootDir, 'server/src'),
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    setupFiles: ['./test/setup.ts'],
    testTimeout: 30_000,
    fileParallelism: false,
    clearMocks: true,
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});

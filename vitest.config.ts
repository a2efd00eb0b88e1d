import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['core/src/**/*.test.ts', 'media/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: [
      {
        find: '@tierline/core',
        replacement: new URL('./core/src/index.ts', import.meta.url).pathname,
      },
      {
        find: '@tierline/media',
        replacement: new URL('./media/src/index.ts', import.meta.url).pathname,
      },
    ],
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['apps/*/test/**/*.spec.{ts,tsx}', 'packages/*/test/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    environment: 'jsdom',
    setupFiles: ['apps/web/test/setup.ts'],
    restoreMocks: true,
    unstubGlobals: true,
  },
});

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@clubhouse/types': pkg('types'),
      '@clubhouse/core': pkg('core'),
      '@clubhouse/persistence': pkg('persistence'),
    },
  },
});

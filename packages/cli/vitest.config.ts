import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'cli',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/bin.ts'],
    },
  },
  resolve: {
    alias: {
      '@dumpshift/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
      '@dumpshift/extract': fileURLToPath(new URL('../extract/src/index.ts', import.meta.url)),
      '@dumpshift/repair': fileURLToPath(new URL('../repair/src/index.ts', import.meta.url)),
    },
  },
});

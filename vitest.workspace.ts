import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/extract/vitest.config.ts',
  'packages/repair/vitest.config.ts',
  'packages/cli/vitest.config.ts',
]);

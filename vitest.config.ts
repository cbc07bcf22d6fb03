import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    pool: 'forks',
    // LanceDB and sync-state tests use temp directories; keep files sequential
    fileParallelism: false,
    sequence: {
      concurrent: false,
    },
    testTimeout: 30000,
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    // Chunk and export tests spin real timers against temp directories
    testTimeout: 10000,
  },
});

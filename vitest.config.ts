import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['syncmap/test/**/*.test.ts'],
    environment: 'node',
  },
});

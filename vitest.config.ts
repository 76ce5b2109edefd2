import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['track-conversion/tests/**/*.test.ts'],
    environment: 'node',
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['escape/tests/**/*.test.ts'],
    environment: 'node',
  },
});

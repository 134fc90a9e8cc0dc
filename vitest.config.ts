import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['world/test/**/*.test.ts', 'runner/test/**/*.test.ts'],
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['test/**/*.test.ts'],
  },
  resolve: {
    // .js imports resolve to .ts sources during test
    extensions: ['.ts', '.js', '.json'],
  },
});

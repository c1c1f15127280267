import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './test-output/vitest/coverage',
      exclude: ['node_modules/**', 'dist/**', '**/*.test.ts', 'src/test/**'],
      include: ['src/**/*.ts'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});

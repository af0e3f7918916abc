import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'benchmarks'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', '**/*.d.ts'],
      thresholds: {
        statements: 85,
        branches: 80,
        functions: 85,
        lines: 85,
      },
    },

    // Side tables are module-level; keep each file in its own worker.
    isolate: true,

    clearMocks: true,
    restoreMocks: true,
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist', '**/examples/**'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        '**/__mocks__/**',
        'src/index.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,
  },
});

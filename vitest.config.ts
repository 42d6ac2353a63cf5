import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    // Test environment
    environment: 'node',

    // Test patterns
    include: [
      'test/**/*.test.ts',
      'test/**/*.spec.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,

    // Coverage configuration (vitest run --coverage)
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        'test/**',
        'src/index.ts',
        'src/types/**'
      ]
    },

    watch: false
  }
});

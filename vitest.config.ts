/**
 * Honeytrap Vitest Configuration
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Test file patterns
    include: [
      'tests/**/*.test.ts',
      'tests/**/*.spec.ts'
    ],
    exclude: [
      'node_modules/**',
      'dist/**'
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/cli/**',
        '**/*.test.ts',
        '**/*.config.ts'
      ]
    },

    // Timeouts
    testTimeout: 30000,
    hookTimeout: 15000,

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Mock configuration
    clearMocks: true,

    sequence: {
      shuffle: false
    }
  }
});

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: [
      'src/**/*.{test,spec}.ts',
      'optimizer/**/*.{test,spec}.ts',
      'tests/**/*.{test,spec}.ts'
    ],

    exclude: [
      'node_modules/**',
      'dist/**',
      '**/*.d.ts'
    ],

    // Global setup/teardown
    globalSetup: ['./tests/setup/global-setup.ts'],
    setupFiles: ['./tests/setup/test-setup.ts'],

    testTimeout: 10000,
    hookTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'src/**/*.ts',
        'optimizer/**/*.ts'
      ],
      exclude: [
        '**/*.test.ts',
        'tests/**',
        '**/*.config.ts'
      ]
    },

    // better-sqlite3 is a native addon; forks keep it out of worker threads
    pool: 'forks',

    clearMocks: true,
    restoreMocks: true,

    watch: false
  }
})

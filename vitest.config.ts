import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Chart rendering and file publishing touch the filesystem
    testTimeout: 15000,
    hookTimeout: 10000,

    reporters: ['default'],

    // Silences console output (logger default sink) during tests
    setupFiles: ['./test/setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
      thresholds: {
        lines: 80,
        branches: 75,
        functions: 80,
        statements: 80,
      },
    },

    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
      },
    },

    clearMocks: true,
    restoreMocks: true,
  },
});

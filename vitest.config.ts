/// <reference types="vitest" />
import { defineConfig } from 'vite';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    // Use forks instead of threads - they clean up more reliably
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        isolate: true,
      },
    },
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'WARN',
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    exclude: ['node_modules/**', 'dist/**', 'coverage/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/index.ts',  // Re-exports only
        '**/*.test.ts',
        'src/__fixtures__/**',
        'src/types/**',
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 75,
        statements: 85,
      },
    },
  },
});

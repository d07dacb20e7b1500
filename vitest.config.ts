import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      // Only production sources count towards coverage
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        '**/*.test.ts',
        'tests/**',

        // Entry points (re-exports and process wiring)
        'src/index.ts',
        'src/core/index.ts',
        'src/config/index.ts',
        'src/start-server.ts',

        // Type-only files
        'src/core/types.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
      all: true,
      skipFull: false,
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Globals disabled - explicit imports required
    globals: false,

    include: ['test/**/*.test.ts'],

    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/cli.ts', // Process entry (integration-heavy)
      ],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
        statements: 70,
      },
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    watch: false,
    include: [
      'tests/**/*.test.ts',
    ],
    exclude: [
      '**/node_modules/**',
    ],
    coverage: {
      provider: 'v8',
      include: [
        'src/**/*.ts',
      ],
      exclude: [
        '**/node_modules/**',
        '**/*.d.ts',
        '**/*.test.ts',
      ],
      thresholds: {
        statements: 95,
        branches: 90,
        functions: 95,
        lines: 95,
      },
      clean: true,
      reportsDirectory: './.config/coverage',
    },
  },
});

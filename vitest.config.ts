import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts', './e2e/**/*.test.ts'],
    coverage: {
      exclude: ['examples/**', '**/types/**', '**/*types.ts', '**/__fixtures__/**', ...coverageConfigDefaults.exclude],
    },
  },
});

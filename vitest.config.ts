import { defineConfig, type ViteUserConfig } from 'vitest/config';

export default defineConfig((): ViteUserConfig => {
  return {
    test: {
      include: ['server/**/*.test.ts', 'services/**/*.test.ts', 'clients/**/*.test.ts', 'scripts/**/*.test.ts'],
      env: {
        NODE_ENV: 'test',
        LOG_LEVEL: 'error',
      },
      coverage: {
        provider: 'v8',
        reportsDirectory: 'coverage',
        reporter: ['text-summary', 'lcov'],
        include: ['server/**/*.ts', 'services/**/*.ts', 'clients/**/*.ts'],
        exclude: ['**/*.d.ts', 'server/index.ts'],
        thresholds: {
          lines: 80,
          branches: 75,
          functions: 80,
          statements: 80,
        },
      },
    },
  };
});

import type { UserConfig } from 'vitest/config';

/**
 * Base Vitest configuration for docmill workspaces. Tests live next to
 * their sources; `src/testing` holds fixtures and doubles and is left out
 * of coverage.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.test.ts'],
      testTimeout: 10000,
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json-summary'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: [
          '**/index.ts',
          '**/*.test.ts',
          '**/*.d.ts',
          'src/testing/**',
        ],
        thresholds: {
          lines: 90,
          functions: 90,
          branches: 85,
          statements: 90,
        },
      },
      ...options.test,
    },
  };
};

import type { ViteUserConfig } from 'vitest/config';

export const defineConfig = (options: ViteUserConfig = {}): ViteUserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts'],
      },
      ...options.test,
    },
  };
};

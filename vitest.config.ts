import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'pandora',
    environment: 'node',
    include: ['shared/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/*.d.ts'],
    testTimeout: 20_000,
  },
});

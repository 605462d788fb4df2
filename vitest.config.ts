import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/tests/unit/**/*.test.ts',
      'packages/*/tests/integration/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
  },
});

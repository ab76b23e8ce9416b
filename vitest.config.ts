import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration covering every workspace package.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules',
        'dist',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/*.config.ts',
      ],
    },
    testTimeout: 30000,
    reporters: ['default'],
  },
});

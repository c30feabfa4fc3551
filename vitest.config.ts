import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec,prop.test}.ts'],
    exclude: ['node_modules/', 'dist/'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'src/test-utils/',
        '**/*.test.ts',
        '**/*.spec.ts',
        '**/*.prop.test.ts',
        'vitest.config.ts',
      ],
    },
    testTimeout: 60000, // property tests encode and decode whole circuits
  },
});

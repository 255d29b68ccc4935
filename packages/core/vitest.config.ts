import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/**/*.spec.ts',
        // Barrel re-export files
        'src/**/index.ts',
        // Type-only modules
        'src/**/types.ts',
      ],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});

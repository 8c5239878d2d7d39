import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Cloud Functions code runs on Node, no DOM
    environment: 'node',

    // Include test files
    include: ['tests/**/*.{test,spec}.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['functions/src/**'],
      exclude: [
        'functions/src/index.ts',
        'functions/src/endpoints.ts',
        '**/*.d.ts',
      ],
    },
  },
});

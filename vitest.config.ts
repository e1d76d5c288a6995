import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      // Only include source files
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        // CLI entry point - exercised through run()
        'packages/cli/src/main.ts',
        'packages/*/src/**/*.test.ts',
      ],
    },
  },
});

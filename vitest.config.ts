import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    testTimeout: 30000,

    // Silence loader warnings printed during lenient-mode tests
    onConsoleLog: () => false,

    setupFiles: ['./tests/setup.ts'],
  },
});

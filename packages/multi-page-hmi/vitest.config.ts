import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    testTimeout: 30000,
    setupFiles: ['./tests/setup.ts'],

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,
  },
});

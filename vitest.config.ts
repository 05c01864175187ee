/**
 * Vitest Configuration for apt-show-versions
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // describe/it/expect are also imported explicitly in each test file
    globals: true,

    environment: 'node',

    // tsc --noEmit covers the tests
    typecheck: {
      enabled: false,
    },
  },
});

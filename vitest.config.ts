/**
 * @fileoverview Vitest configuration for the workspace
 *
 * @description
 * One run covers every package. Tests sit in `__tests__/` folders next to
 * the code they exercise and never need Postgres, Redis or OpenSearch.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    restoreMocks: true,
  },
})

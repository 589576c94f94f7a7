/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@lsp-relay/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    include: [
      'packages/core/src/**/*.test.ts',
      'packages/relay/test/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 30000,
    teardownTimeout: 10000,
    pool: 'forks',
  },
});

// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['client/src/**/*.test.ts', 'examples/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    name: 'nodejs',
    environment: 'node',
    testTimeout: 10_000,
  },
});

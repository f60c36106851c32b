import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@gpx-colorizer/gpx': source('gpx'),
      '@gpx-colorizer/core': source('core'),
      '@gpx-colorizer/test-utils': source('test-utils'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    passWithNoTests: true,
    testTimeout: 30000,
  },
});

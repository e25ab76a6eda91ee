import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.{ts,tsx}', 'apps/*/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    // Components, stores and hooks need a DOM and localStorage
    environmentMatchGlobs: [
      ['**/packages/ui/**', 'jsdom'],
      ['**/apps/web/**', 'jsdom'],
    ],
    setupFiles: ['./vitest.setup.ts'],
  },
});

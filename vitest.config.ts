// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globalSetup: './approvals/global-setup.ts',
    // Every test must release the configuration overrides it acquires
    setupFiles: ['./approvals/leak-check.ts'],

    include: ['test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.{idea,git,cache,output,temp}/**'],

    // Never launch a diff tool from this repo's own tests
    env: {
      APPROVALS_REPORTER: 'quiet',
    },

    // Keep interop default so CJS dependencies (fs-extra, fast-glob) load as default imports
    deps: {
      interopDefault: true,
    },

    reporters: ['default', './approvals/vitest-reporter.ts'],
  },
});

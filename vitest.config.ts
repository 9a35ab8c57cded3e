import { defineConfig } from 'vitest/config';
import { sharedVitestConfig } from './packages/vitest-config/src/index.js';

export default defineConfig({
  test: {
    ...sharedVitestConfig.test,
    include: ['packages/*/src/**/*.test.ts'],
  },
});

export const sharedVitestConfig = {
  test: {
    globals: true,
    silent: true,
    restoreMocks: true,
    coverage: {
      provider: 'v8' as const,
      reporter: ['text' as const, 'html' as const],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        // Type-only contracts have no runtime to execute.
        'packages/core/src/types/**/*.ts',
      ],
    },
  },
};

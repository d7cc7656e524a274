import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['packages/*/src/**/*.test.{ts,tsx}', 'packages/*/tests/**/*.test.{ts,tsx}'],
    // React tests opt into jsdom with a `@vitest-environment jsdom` docblock
    environment: 'node',
    poolOptions: {
      forks: {
        // Lets the disposable tests force a collection
        execArgv: ['--expose-gc'],
      },
    },
  },
});

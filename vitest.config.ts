import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['pomoquest-core/src/**/*.test.ts', 'pomoquest-cli/src/**/*.test.{ts,tsx}'],
    environment: 'node',
  },
});

import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // esbuild renames function expressions that shadow an outer binding
  // (e.g. `const add = wrap(function add() {})` -> `add2`), which changes
  // `fn.name`; swc keeps names as tsc would emit them.
  esbuild: false,
  plugins: [swc.vite({ jsc: { target: 'es2022' } })],
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      exclude: ['**/node_modules/**', '**/*.d.ts', '**/__tests__/**'],
      include: ['packages/*/src/**/*.ts'],
      thresholds: {
        functions: 85,
        lines: 77,
        branches: 80,
      },
    },
  },
});

import { transformWithEsbuild, type Plugin } from 'vite';
import { defineConfig } from 'vitest/config';

// Vite's built-in esbuild transform forces `keepNames: false`, which renames
// shadowed classes (e.g. a second `class Invoice` becomes `Invoice2`) and
// breaks class-name lookups. Transform TypeScript with names preserved instead.
const typescriptKeepNames = (): Plugin => ({
  name: 'typescript-keep-names',
  enforce: 'pre',
  async transform(code, id) {
    if (!/\.[cm]?tsx?$/.test(id.split('?')[0] ?? id)) return null;
    const result = await transformWithEsbuild(code, id, {
      target: 'es2022',
      keepNames: true,
      sourcemap: true,
    });
    return { code: result.code, map: JSON.stringify(result.map) };
  },
});

export default defineConfig({
  esbuild: false,
  plugins: [typescriptKeepNames()],
  test: {
    globals: true,

    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov', 'json'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        '**/*.test.ts',
        'vitest.config.ts',
        '**/*.d.ts',
      ],
      include: ['src/**/*.ts'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,
    hookTimeout: 10000,

    // Behavior
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
  },
});

import { defineConfig, transformWithEsbuild, type Plugin } from 'vite';

// Vite's built-in esbuild transform forces `keepNames: false`, which lets
// esbuild rename function expressions shadowed by a binding of the same name
// (e.g. `const parentStep = step(async function parentStep() {})`), changing
// `fn.name`. Transform TypeScript here instead, preserving function names.
function esbuildKeepNames(): Plugin {
  return {
    name: 'esbuild-keep-names',
    enforce: 'pre',
    async transform(code, id) {
      if (!/\.(m?ts|tsx)$/.test(id.split('?')[0] ?? id)) return null;
      const result = await transformWithEsbuild(code, id, {
        target: 'esnext',
        keepNames: true,
        sourcemap: true,
      });
      return { code: result.code, map: JSON.stringify(result.map) };
    },
  };
}

export default defineConfig({
  esbuild: false,
  plugins: [esbuildKeepNames()],
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/**/*.d.ts'],
    },
    testTimeout: 10000,
  },
});

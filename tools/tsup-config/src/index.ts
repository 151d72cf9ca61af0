import type { Options } from 'tsup';

/**
 * Shared tsup defaults: dual CJS/ESM output with declarations.
 * Workspace packages are bundled into the consumer (`noExternal`).
 */
export const defineConfig = (options: Options = {}): Options => {
  return {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    sourcemap: true,
    noExternal: [/^@papertrans\//],
    ...options,
  };
};

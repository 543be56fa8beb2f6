import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,
  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: ['@arbiter/core'],
  external: ['chalk', 'commander', 'eventemitter3', 'ora', 'yaml', 'zod'],
});

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'], // single entrypoint for the published bundle
  format: ['esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true
});

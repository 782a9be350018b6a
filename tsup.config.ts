import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/api.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  external: [
    // All dependencies should be external for CLI tool
    'chalk',
    'commander',
    'fast-glob',
    'fast-xml-parser',
    'jszip',
    'strip-ansi',
    'zod'
  ]
});

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  target: 'node20',
  outDir: 'dist',
  splitting: false,
  external: [
    // All dependencies should be external for CLI tool
    'chalk',
    'cheerio',
    'commander',
    'domhandler',
    'fast-glob',
    'micromatch',
    'strip-ansi',
    'yaml',
    'zod'
  ]
});

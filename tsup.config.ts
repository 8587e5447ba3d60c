import { defineConfig } from 'tsup'

export default defineConfig([
  // Library entry point
  {
    entry: ['src/index.ts'],
    format: ['esm', 'cjs'],
    dts: true,
    clean: true,
    outDir: 'dist',
    splitting: false,
    sourcemap: false,
    target: 'node20',
    shims: true, // Add shims for import.meta in CJS
    cjsInterop: true,
  },
  // CLI entry (ESM only, executable)
  {
    entry: { cli: 'src/cli/index.ts' },
    format: ['esm'],
    outDir: 'dist',
    splitting: false,
    sourcemap: false,
    target: 'node20',
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
  // Worker file (loaded by worker_threads, must be a separate file)
  {
    entry: ['src/worker/render-worker.ts'],
    format: ['esm'],
    outDir: 'dist/worker',
    splitting: false,
    sourcemap: false,
    target: 'node20',
  },
])

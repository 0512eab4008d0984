import { defineConfig } from 'tsup';

export default defineConfig([
  // Library entry: ESM with .d.ts
  {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    dts: true,
    sourcemap: true,
    clean: true,
    target: 'node20',
    external: ['@xterm/xterm'],
  },
  // CLI entry: self-contained bundle with a shebang
  {
    entry: { cli: 'src/cli.ts' },
    format: ['esm'],
    sourcemap: true,
    target: 'node20',
    banner: { js: '#!/usr/bin/env node' },
    external: ['@xterm/xterm'],
  },
]);

import { defineConfig } from 'tsup';

export default defineConfig([
  // Library: devices, sprites, menus and backends, with .d.ts
  {
    entry: {
      index: 'src/index.ts',
    },
    format: ['esm'],
    dts: true,
    sourcemap: true,
    clean: true,
  },
  // menukit command
  {
    entry: { cli: 'src/cli.ts' },
    format: ['esm'],
    sourcemap: true,
    banner: { js: '#!/usr/bin/env node' },
  },
]);

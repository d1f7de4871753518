import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  clean: true,
  bundle: true,
  splitting: false,
  treeshake: true,
  // workspace packages ship TypeScript sources
  noExternal: [/^@tessera\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});

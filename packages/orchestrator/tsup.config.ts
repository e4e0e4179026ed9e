import { defineConfig } from 'tsup';

// Workspace packages export TypeScript sources, so they are bundled in.
const INTERNAL_BUNDLE = [/^@reindexer\//];

export default defineConfig(() => ({
  entry: {
    index: 'src/index.ts',
    cli: 'bin/cli.ts',
  },
  target: 'node20',
  format: ['esm'],
  platform: 'node',
  sourcemap: true,
  clean: true,
  splitting: false,
  treeshake: true,
  minify: false,
  outDir: 'bundle',
  dts: false,
  noExternal: INTERNAL_BUNDLE,
  tsconfig: '../../tsconfig.json',
}));

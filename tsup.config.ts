import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'docker/server': 'docker/server.ts',
    'bin/inspect': 'bin/inspect.ts',
  },
  format: ['esm'],
  dts: false,
  splitting: false,
  sourcemap: true,
  clean: true,
  minify: false,
  target: 'node20',
  platform: 'node',
  outDir: 'dist',
  external: ['hono', '@hono/node-server', 'unzipit', 'p-limit'],
});

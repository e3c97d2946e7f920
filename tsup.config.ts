import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',
    'src/adapters/memory/index.ts',
    'src/adapters/drizzle/index.ts',
  ],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: false,
  splitting: true,
  treeshake: true,
  external: [
    'drizzle-orm',
    'hono',
    'zod',
  ],
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Benchmarks should run without dev logging noise.
  define: {
    'process.env.NODE_ENV': '"production"',
  },
  test: {
    environment: 'jsdom',
    globals: true,
    include: [],
    benchmark: {
      include: ['benches/**/*.bench.ts'],
    },
  },
});

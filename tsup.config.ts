import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/kvbench-report.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
});

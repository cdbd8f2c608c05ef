// vite.config.ts
import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'Lemma',
      fileName: 'lemma',
      formats: ['es', 'umd'],
    },
    rollupOptions: {
      external: ['d3', 'jstat'],
      output: {
        globals: { d3: 'd3', jstat: 'jStat' },
      },
    },
  },
});

import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  build: {
    target: 'node20',
    ssr: true,
    lib: {
      entry: fileURLToPath(new URL('./src/container-entry.ts', import.meta.url)),
      formats: ['es'],
      fileName: 'container-entry',
    },
    outDir: 'dist-bundle',
    emptyOutDir: true,
    rollupOptions: {
      external: [/^node:/],
      output: {
        entryFileNames: '[name].js',
      },
    },
    minify: false,
    sourcemap: true,
  },
});

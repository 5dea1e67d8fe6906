import { defineConfig } from 'vite';

export default defineConfig({
  build: {
    // Node bundle for the CLI: builtins and npm dependencies stay external in SSR mode.
    ssr: 'src/main.ts',
    target: 'node20',
    outDir: 'dist',
    emptyOutDir: true,
    rollupOptions: {
      output: {
        entryFileNames: 'main.js',
        banner: '#!/usr/bin/env node',
      },
    },
  },
});

import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';

// Builds the dashboard script as a single file served by the Fastify server
// from /static/progress-dashboard.js
export default defineConfig({
  build: {
    outDir: 'dist',
    emptyOutDir: true,
    sourcemap: true,
    lib: {
      entry: fileURLToPath(new URL('./src/main.ts', import.meta.url)),
      name: 'ProgressDashboard',
      formats: ['iife'],
      fileName: () => 'progress-dashboard.js',
    },
  },
});

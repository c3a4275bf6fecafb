import { defineConfig } from 'vite';

const BACKEND_URL = process.env.VITE_BACKEND_URL ?? 'http://localhost:3001';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  server: {
    proxy: {
      '/api': BACKEND_URL,
      '/config.js': BACKEND_URL,
    },
  },
  build: {
    outDir: 'build',
    sourcemap: true,
  },
});

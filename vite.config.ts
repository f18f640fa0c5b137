import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// The dashboard API runs in the Node server (npm start); the dev server
// forwards /api there.
export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      '/api': `http://localhost:${process.env.PORT ?? 8080}`,
    },
  },
  build: {
    outDir: 'dist',
  },
});

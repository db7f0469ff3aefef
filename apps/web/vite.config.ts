import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), 'VITE_');
  const target = env['VITE_DEV_PROXY_TARGET'] ?? 'http://localhost:5000';

  return {
    plugins: [react()],
    server: {
      port: 5173,
      // Backend owns /api and /resources; everything else is the SPA
      proxy: {
        '/api': { target, changeOrigin: true },
        '/resources': { target, changeOrigin: true },
      },
    },
    build: {
      outDir: 'dist',
      sourcemap: true,
    },
  };
});

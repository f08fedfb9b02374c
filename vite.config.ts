import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import { catalogApiPlugin } from './src/server/catalogApiPlugin';

export default defineConfig({
  plugins: [react(), catalogApiPlugin()],
  server: {
    port: 3000,
  },
});

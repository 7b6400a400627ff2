import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// https://vite.dev/config/
export default defineConfig(({ command }) => ({
  // Production builds are served under /reelpick/.
  base: command === 'build' ? '/reelpick/' : '/',
  plugins: [react()],
  server: {
    proxy: {
      // Outbound mail goes through the relay service.
      '/api': {
        target: 'http://localhost:3000',
        changeOrigin: true,
      },
    },
  },
}))

import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  // Assets resolve relatively so the build also opens from file://.
  base: './',
  publicDir: false,
})

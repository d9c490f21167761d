import { defineConfig } from 'vite'

// https://vitejs.dev/config/
export default defineConfig({
  define: {
    // Release ID for debugging (git SHA + build time in CI; "dev" locally)
    'import.meta.env.VITE_RELEASE': JSON.stringify(
      process.env.VITE_RELEASE || process.env.RELEASE || 'dev'
    ),
    // Sentry (optional; only used when VITE_SENTRY_DSN is set at build)
    'import.meta.env.VITE_SENTRY_DSN': JSON.stringify(process.env.VITE_SENTRY_DSN || ''),
    'import.meta.env.VITE_SENTRY_ENV': JSON.stringify(process.env.VITE_SENTRY_ENV || process.env.NODE_ENV || ''),
  },
  build: {
    target: 'es2020',
    // Single script the server-rendered pages include; the API serves it from /static/.
    lib: {
      entry: 'src/main.ts',
      name: 'formtask',
      formats: ['iife'],
      fileName: () => 'formtask.js',
    },
    outDir: 'dist',
    emptyOutDir: true,
  },
})

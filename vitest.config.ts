import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  resolve: {
    alias: {
      '@engine': fileURLToPath(new URL('./src/engine', import.meta.url)),
      '@state': fileURLToPath(new URL('./src/state', import.meta.url))
    }
  },
  test: {
    include: ['tests/**/*.test.ts']
  }
})

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Installs a silent global `log` before any module under test loads
    setupFiles: ['test/setup.ts'],
    testTimeout: 10000,
  },
})

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    testTimeout: 30000,
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})

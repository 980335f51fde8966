import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'packages/config/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
})

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Force exit after tests complete
    teardownTimeout: 1000,
    coverage: {
      provider: 'v8',
      reporter: ['json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/test-utils/**']
    }
  }
})

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['back/src/**/*.test.ts'],
    restoreMocks: true
  }
})

/// <reference types="vitest/config" />
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts', 'src/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    env: {
      LOG_LEVEL: 'info',
      LOG_TIMEZONE: 'UTC'
    }
  }
})

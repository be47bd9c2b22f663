import { defineConfig, mergeConfig } from 'vitest/config'
import viteConfig from './vite.config'

export default mergeConfig(
  viteConfig,
  defineConfig({
    test: {
      environment: 'jsdom',
      include: ['frontend/src/**/*.test.{ts,tsx}'],
      setupFiles: ['./frontend/src/test/setup.ts'],
    },
  })
)

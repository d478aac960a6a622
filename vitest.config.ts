import { existsSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { resolve } from 'node:path'
import { config as loadEnv } from 'dotenv'
import { defineConfig } from 'vitest/config'

const rootDir = fileURLToPath(new URL('.', import.meta.url))

const envPath = resolve(rootDir, '.env')
if (existsSync(envPath)) {
  loadEnv({ path: envPath })
}

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@chronicle-api/shared': resolve(rootDir, 'packages/shared/src'),
    },
  },
})

import { defineConfig } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

export const aliases = {
  '@carelog/core': resolve(__dirname, 'packages/core/src/index.ts'),
  '@carelog/functions/visits': resolve(__dirname, 'packages/functions/src/visits/index.ts'),
}

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/src/**/*.spec.ts',
    ],
    exclude: ['node_modules/**', 'dist/**'],
  },
})

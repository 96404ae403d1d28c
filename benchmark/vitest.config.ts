import { defineConfig } from 'vitest/config'
import { dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    name: 'benchmark',
    root: __dirname,

    // Harness tests only; the suites themselves run through `npm run bench`
    include: ['lib/**/*.test.ts'],

    environment: 'node',
    testTimeout: 30000,
  },
})

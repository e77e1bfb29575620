import { defineConfig } from 'vitest/config'

// Needs a live global zone host; see test/zone.integration.test.ts
export default defineConfig({
  test: {
    include: ['test/**/*.integration.test.ts'],
    environment: 'node',
    testTimeout: 20 * 60_000,
  },
})

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['client/src/**/*.test.ts', 'server/src/**/*.test.ts'],
    environment: 'node',
    // Client suites opt into a DOM with a `@vitest-environment jsdom` docblock
    env: { NODE_ENV: 'test' },
  },
})

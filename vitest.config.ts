import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    setupFiles: ['apps/harvester/src/test-setup/no-network.setup.ts'],
    testTimeout: 10000,
  },
})

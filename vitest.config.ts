// Vitest configuration for calmirror.
// Tests live beside their sources as src/**/*.test.ts.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
  },
})

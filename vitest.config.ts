import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const packageSource = (path: string): string =>
  fileURLToPath(new URL(`./packages/${path}`, import.meta.url))

export default defineConfig({
  resolve: {
    // Workspace packages export their build output; tests run from sources.
    alias: [
      { find: /^@hashdrop\/core\/(.+)$/, replacement: packageSource('core/src/$1/index.ts') },
      { find: /^@hashdrop\/ssh$/, replacement: packageSource('ssh/src/index.ts') },
    ],
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/test-utils/**'],
    },
  },
})

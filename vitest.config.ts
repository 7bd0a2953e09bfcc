import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const fromRoot = (relative: string) =>
  fileURLToPath(new URL(relative, import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['test/**/*.test.ts'],
    globalSetup: './test/setup/global-setup.ts',
    setupFiles: ['./test/setup/msw-setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      {
        find: /^@root\/(.*)\.js$/,
        replacement: fromRoot('./src/$1.ts'),
      },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: fromRoot('./src/services/$1.ts'),
      },
      {
        find: /^@plugins\/(.*)\.js$/,
        replacement: fromRoot('./src/plugins/$1.ts'),
      },
      {
        find: /^@utils\/(.*)\.js$/,
        replacement: fromRoot('./src/utils/$1.ts'),
      },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: fromRoot('./src/schemas/$1.ts'),
      },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})

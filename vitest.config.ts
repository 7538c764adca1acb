import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import react from '@vitejs/plugin-react'

const isCI = process.env.CI === 'true'

export default defineConfig({
  plugins: [react()],
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/src/**/*.test.tsx',
    ],
    exclude: ['node_modules/**'],
    // Web tests opt into jsdom with a @vitest-environment docblock
    environment: 'node',
    setupFiles: ['packages/web/src/test-setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: [
        'packages/diabetes/src/**/*.ts',
        'packages/functions/src/**/*.ts',
        'packages/local-dev/src/**/*.ts',
        'packages/cli/src/**/*.ts',
        'packages/web/src/**/*.tsx',
      ],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/*.test.tsx',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/*.config.ts',
        '**/index.ts',
        'packages/local-dev/src/server.ts',
        'packages/cli/src/cli.ts',
        'packages/web/src/main.tsx',
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
})

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
  resolve: {
    // Workspace packages run from their sources; dist/ only exists after a build
    alias: {
      '@tracklane/logger': source('logger'),
      '@tracklane/jira-client': source('jira-client'),
      '@tracklane/mcp-server': source('mcp-server'),
    },
    conditions: ['source'],
  },
});

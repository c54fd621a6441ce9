import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const REPO_ROOT = path.dirname(fileURLToPath(import.meta.url));

const workspaceEntry = (name: string): string =>
  path.join(REPO_ROOT, 'packages/@portfolio-sync', name, 'src/index.ts');

export default defineConfig({
  resolve: {
    alias: {
      '@portfolio-sync/directory-sdk': workspaceEntry('directory-sdk'),
      '@portfolio-sync/core': workspaceEntry('core'),
      '@portfolio-sync/cli': workspaceEntry('cli'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});

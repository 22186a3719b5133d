import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const resolveFromRoot = (relativePath: string) => path.resolve(__dirname, relativePath);

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts', 'backend/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: [
      { find: '@killtrack/database/testing', replacement: resolveFromRoot('packages/database/src/testing.ts') },
      { find: '@killtrack/database', replacement: resolveFromRoot('packages/database/src/index.ts') },
      { find: '@killtrack/shared', replacement: resolveFromRoot('packages/shared/src/index.ts') },
      { find: '@killtrack/esi-client', replacement: resolveFromRoot('packages/esi-client/src/index.ts') },
      { find: '@killtrack/auth', replacement: resolveFromRoot('packages/auth/src/index.ts') },
    ],
  },
});

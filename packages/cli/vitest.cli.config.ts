import { fileURLToPath } from 'node:url';
import tsconfigPaths from 'vite-tsconfig-paths';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('../../', import.meta.url));

export default defineConfig({
  root: fileURLToPath(new URL('.', import.meta.url)),
  plugins: [tsconfigPaths({ projects: [`${rootDir}tsconfig.json`] })],
  resolve: {
    alias: [
      {
        find: /^@bbsync\/core\/(.*)\.js$/,
        replacement: `${rootDir}packages/core/src/$1.ts`,
      },
    ],
  },
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/dist/**'],
    setupFiles: ['../core/tests/setup.ts'],
  },
});

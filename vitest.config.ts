import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

// Workspace packages resolve to their sources, so tests need no build.
export default defineConfig({
  resolve: {
    alias: [
      { find: /^@holdback\/kernel$/, replacement: source('kernel') },
      { find: /^@holdback\/runtime-host$/, replacement: source('runtime-host') },
    ],
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@billing-audit\/core$/, replacement: source('core') },
      { find: /^@billing-audit\/connector-file$/, replacement: source('connector-file') },
      { find: /^@billing-audit\/audit-core$/, replacement: source('audit-core') },
    ],
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});

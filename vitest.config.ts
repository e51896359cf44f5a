import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^types$/, replacement: `${root}types.ts` },
      { find: /^index$/, replacement: `${root}index.ts` },
      { find: /^src\//, replacement: `${root}src/` },
    ],
  },
  test: {
    include: ['test/**/*.test.ts'],
  },
});

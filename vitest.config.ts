import { defineConfig } from 'vitest/config';
import * as path from 'path';

const packages = ['types', 'crypto', 'evm', 'tracker'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@logtrack/${pkg}`] = path.resolve(__dirname, `packages/${pkg}/src/index.ts`);
}

export default defineConfig({
  resolve: { alias },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/test-support.ts'],
      reporter: ['text', 'text-summary'],
    },
  },
});

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const root = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@docweave/shared': root('./packages/shared/index.ts'),
      '@docweave/planner': root('./packages/planner/src/index.ts'),
      '@docweave/runner': root('./packages/runner/src/index.ts'),
      '@docweave/cli': root('./packages/cli/src/index.ts'),
      '@docweave/dashboard': root('./packages/dashboard/server/app.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
  },
});

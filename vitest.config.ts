import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    watch: false,
    fileParallelism: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@stepwise/core': src('core'),
      '@stepwise/agent-http': src('agent-http'),
      '@stepwise/agent-ws': src('agent-ws'),
      '@stepwise/reporter-allure': src('reporter-allure'),
    },
  },
});

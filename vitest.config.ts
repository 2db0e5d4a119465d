import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['ingress-controller/src/**/*.test.ts'],
    restoreMocks: true,
  },
});

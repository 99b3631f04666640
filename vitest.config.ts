import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
        globals: false, // We are importing globals explicitly
        environment: 'node',
        testTimeout: 10000,
    },
});

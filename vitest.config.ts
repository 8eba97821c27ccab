import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        testTimeout: 15_000,
        hookTimeout: 10_000,
    },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        setupFiles: ['src/test-setup.ts'],
        environment: 'node',
        testTimeout: 10_000,
    },
});

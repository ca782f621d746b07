import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/unit/specs/**/*.spec.ts'],
        setupFiles: ['tests/unit/setup.ts'],
        environment: 'node',
        testTimeout: 20000,
        restoreMocks: true,
    },
});

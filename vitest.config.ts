import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        setupFiles: ['tests/vitest.setup.ts'],
        clearMocks: true,
        restoreMocks: true,
        mockReset: true,
    },
});

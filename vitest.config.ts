/**
 * Vitest configuration
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        environment: 'node',
        testTimeout: 15_000,
    },
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            libfold: fileURLToPath(new URL('./packages/libfold/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts'],
        environment: 'node',
    },
});

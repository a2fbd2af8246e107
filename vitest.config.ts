import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            libmerge: fileURLToPath(new URL('./packages/libmerge/src/index.ts', import.meta.url)),
            linkparse: fileURLToPath(new URL('./packages/linkparse/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts'],
        environment: 'node',
    },
});

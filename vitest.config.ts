import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        alias: [
            // Workspace packages resolve to their sources so tests need no build
            {
                find: /^@steptrace\/core\/test-utils$/,
                replacement: source('./packages/core/src/test-utils/index.ts'),
            },
            { find: /^@steptrace\/core$/, replacement: source('./packages/core/src/index.ts') },
        ],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        watch: false,
    },
});

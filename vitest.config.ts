import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.spec.ts'],
    },
    resolve: {
        alias: {
            '@route-conventions/types': resolve(__dirname, 'packages/types/src/index.ts'),
            '@route-conventions/core': resolve(__dirname, 'packages/core/src/index.ts'),
            '@route-conventions/cli': resolve(__dirname, 'packages/cli/src/program.ts'),
        },
    },
});

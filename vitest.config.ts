import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const workspace = (pkg: string): string =>
    fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@srvdeck/shared': workspace('shared'),
            '@srvdeck/core': workspace('core'),
        },
    },
    esbuild: {
        jsx: 'automatic',
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        exclude: ['dist/**', 'node_modules/**'],
        server: {
            deps: {
                inline: ['@srvdeck/shared', '@srvdeck/core'],
            },
        },
    },
});

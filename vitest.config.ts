import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@account-service/shared': fileURLToPath(new URL('./modules/shared/src/index.ts', import.meta.url)),
        },
    },
    test: {
        environment: 'node',
        include: ['tests/unit/specs/**/*.spec.ts'],
        testTimeout: 20000,
    },
});

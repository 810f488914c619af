// vitest.config.ts
import {defineConfig} from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.spec.ts'],
        environment: 'node',
        // compose tests build real trees under the OS temp dir
        testTimeout: 20000,
    },
});

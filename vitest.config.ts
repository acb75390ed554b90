import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
            LOG_TO_FILE: 'false',
        },
    },
});

import { tmpdir } from 'os';
import { join } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        environment: 'node',
        env: {
            // Keep logs and databases out of the real home directory
            CONCORD_HOME: join(tmpdir(), 'concord-test'),
        },
    },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Exclude dist folder from test discovery
        exclude: [
            '**/node_modules/**',
            '**/dist/**',
        ],
        // Only include TypeScript source files
        include: ['src/**/*.{test,spec}.ts'],
        env: {
            LOG_LEVEL: 'silent'
        },
        globals: true
    }
});

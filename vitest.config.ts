import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['test/**/*.test.ts'],
        setupFiles: ['test/setup/suppressConsole.ts'],
        coverage: {
            provider: 'istanbul',
            reporter: ['text', 'lcov', 'html'],
            all: true,
            include: ['src/**/*.ts'],
            exclude: [
                'src/main.ts',
                'test/**',
                'dist/**',
                'node_modules/**'
            ],
            reportsDirectory: 'coverage'
        }
    }
});

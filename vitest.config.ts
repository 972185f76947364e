import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const resolveFromRoot = (relativePath: string): string => {
    const rootDir = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(rootDir, relativePath);
};

export default defineConfig({
    resolve: {
        alias: {
            'app': resolveFromRoot('src/app'),
            'config': resolveFromRoot('src/config'),
            'game': resolveFromRoot('src/game'),
            'input': resolveFromRoot('src/input'),
            'render': resolveFromRoot('src/render'),
            'util': resolveFromRoot('src/util'),
            'types': resolveFromRoot('src/types'),
        },
    },
    test: {
        environment: 'jsdom',
        include: ['tests/unit/**/*.spec.ts'],
        setupFiles: ['tests/setup/vitest.setup.ts'],
        clearMocks: true,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['src/**/*.ts'],
        },
    },
});

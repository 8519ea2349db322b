/// <reference types="vitest" />
import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';
import dts from 'vite-plugin-dts';

export default defineConfig({
    build: {
        target: 'node20',
        lib: {
            entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
            name: 'TransportationSolver',
            formats: ['es', 'cjs'],
            fileName: format => (format === 'cjs' ? 'transportation.cjs' : `transportation.${format}.js`),
        },
        rollupOptions: {
            external: ['fs', 'fs/promises', 'path'],
            output: {
                manualChunks: undefined,
            },
        },
        sourcemap: true,
        emptyOutDir: true,
    },
    plugins: [
        dts({
            insertTypesEntry: true,
            outDir: 'dist',
            include: ['src'],
            exclude: ['src/**/*.test.ts'],
        }),
    ],
    define: {
        'import.meta.vitest': 'undefined',
    },
    test: {
        includeSource: ['src/**/*.ts'],
        include: ['src/**/*.test.ts'],
    },
});

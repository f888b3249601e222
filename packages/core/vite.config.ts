import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';
import dts from 'vite-plugin-dts';

export default defineConfig({
    build: {
        target: 'es2022',
        lib: {
            entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
            name: 'SuballocCore',
            formats: ['es', 'cjs'],
            fileName: (format) => `index.${format === 'es' ? 'js' : 'cjs'}`
        },
        sourcemap: true,
        minify: false,
        rollupOptions: {
            external: [
                '@suballoc/types',
                '@suballoc/utils',
            ],
            output: {
                globals: {
                    '@suballoc/utils': 'SuballocUtils',
                    '@suballoc/types': 'SuballocTypes',
                }
            }
        },
        outDir: "dist",
        emptyOutDir: true,
    },
    plugins: [
        dts({
            insertTypesEntry: true,
            rollupTypes: false,
        })
    ],
});

import { defineConfig } from 'vite';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = resolve(dirname(fileURLToPath(import.meta.url)), '..');

// Library build: one ES module per source file under dist/
export default defineConfig({
  root,
  build: {
    target: 'node20',
    lib: {
      entry: resolve(root, 'src/index.ts'),
      formats: ['es'],
    },
    outDir: resolve(root, 'dist'),
    emptyOutDir: true,
    minify: false,
    sourcemap: true,
    rollupOptions: {
      output: {
        preserveModules: true,
        preserveModulesRoot: 'src',
        entryFileNames: '[name].js',
      },
    },
  },
});

import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';
import dts from 'vite-plugin-dts';

export default defineConfig({
  build: {
    outDir: 'dist/bundle',
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'TypefaceResolver',
      fileName: (format) => `index.${format}.js`,
      formats: ['es', 'umd']
    },
    sourcemap: true,
    target: 'es2022'
  },
  plugins: [
    dts({
      outDir: 'dist/bundle',
      include: ['src/**/*'],
      exclude: ['node_modules', 'dist', 'tests', 'scripts']
    })
  ]
});

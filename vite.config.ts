import { defineConfig } from 'vite'
import nodeExternals from 'rollup-plugin-node-externals'

export default defineConfig({
   build: {
      ssr: true,
      target: 'node20',
      outDir: 'dist',
      emptyOutDir: true,
      rollupOptions: {
         input: 'src/main.ts',
      },
   },
   plugins: [nodeExternals()],
})

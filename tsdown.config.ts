import { defineConfig } from 'tsdown'

export default defineConfig({
  // CLI binary: dist/cli.mjs, workspace packages bundled inline
  entry: { cli: './packages/cli/src/cli.ts' },
  format: 'esm',
  platform: 'node',
  dts: false,
  clean: true,
  outDir: 'dist',
  fixedExtension: true,
  noExternal: [/^@stratasplit\//],
})

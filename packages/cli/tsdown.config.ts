import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: [/^@pdu-cycle\//],
  external: ['chalk', 'commander', 'net-snmp', 'zod']
});

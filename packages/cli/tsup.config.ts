import { defineConfig } from "tsup";

export default defineConfig({
  entry: { cli: "src/bootstrap/cli.ts" },
  format: ["esm"],
  platform: "node",
  target: "node20",
  clean: true,
  sourcemap: true,
  splitting: false,
  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: [/^@tracking-bootstrap\//],
  // pino loads its transports by name from node_modules at run time
  external: ["pino", "pino-pretty"],
  esbuildOptions(options) {
    options.keepNames = true;
  },
});

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  noExternal: ["@apiconform/core"],
  banner: {
    js: "#!/usr/bin/env node"
  }
});

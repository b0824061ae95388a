import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"]
  },
  resolve: {
    alias: {
      "@apiconform/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url))
    }
  }
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@breach-path/shared": fileURLToPath(new URL("./packages/shared/src/index.ts", import.meta.url)),
      "@breach-path/sim": fileURLToPath(new URL("./packages/sim/src/index.ts", import.meta.url))
    }
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    environment: "node"
  }
});

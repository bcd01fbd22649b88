import { defineConfig } from "vitest/config";
import { fileURLToPath, URL } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@incident-responder/graph-engine": fileURLToPath(new URL("./packages/graph-engine/src/index.ts", import.meta.url)),
      "@incident-responder/shared-types": fileURLToPath(new URL("./packages/shared-types/src/index.ts", import.meta.url))
    }
  },
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"]
  }
});

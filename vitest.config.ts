import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
      "~shared": fileURLToPath(new URL("./deps/shared/src", import.meta.url)),
      "~test": fileURLToPath(new URL("./test", import.meta.url)),
    },
  },
  test: {
    include: ["test/**/*.test.ts", "deps/shared/test/**/*.test.ts"],
    environment: "node",
    fileParallelism: false,
  },
});

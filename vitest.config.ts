import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      chainlet: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
    },
  },
  test: {
    dir: "test",
    include: ["**/*.test.ts"],
  },
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@cotask/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
      "@cotask/compose": fileURLToPath(new URL("./packages/compose/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});

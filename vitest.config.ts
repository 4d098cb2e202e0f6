import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@arena/session": fileURLToPath(new URL("./packages/session/src/index.ts", import.meta.url)),
      "@arena/example-deathmatch": fileURLToPath(new URL("./examples/deathmatch/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "examples/*/**/*.test.ts", "src/**/*.test.ts"],
    environment: "node",
  },
});

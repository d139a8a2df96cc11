import { defineConfig } from "vitest/config";
import { src_aliases } from "./config/aliases";

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    benchmark: {
      include: ["src/**/__tests__/**/*.bench.ts"],
    },
    alias: src_aliases(__dirname),
  },
});

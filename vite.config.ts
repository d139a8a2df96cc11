import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import path from "path";
import { src_aliases } from "./config/aliases";

/**
 * Replace __DEV__ with a runtime process.env check so consumers'
 * bundlers can drop the dev-only hash assertion.
 */
function replace_dev_global(): Plugin {
  return {
    name: "replace-dev-global",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(
        /\b__DEV__\b/g,
        'process.env.NODE_ENV !== "production"',
      );
      return result !== code ? result : null;
    },
  };
}

export default defineConfig(({ command }) => ({
  plugins:
    command === "build"
      ? [replace_dev_global(), dts({ tsconfigPath: "./tsconfig.build.json" })]
      : [],

  define: command === "build" ? {} : { __DEV__: "true" },

  resolve: {
    alias: src_aliases(__dirname),
  },

  build: {
    target: "es2022",
    outDir: "dist",
    lib: {
      entry: path.resolve(__dirname, "src/index.ts"),
      name: "tallymap",
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
  },
}));

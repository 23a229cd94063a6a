import { defineConfig } from "vite";
import { fileURLToPath } from "url";
import { builtinModules } from "module";
import dts from "vite-plugin-dts";

export default defineConfig({
  plugins: [dts({ rollupTypes: true, exclude: ["src/**/__tests__/**"] })],
  build: {
    lib: {
      entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      formats: ["es", "cjs"],
      fileName: (format) => `index.${format === "es" ? "js" : "cjs"}`,
    },
    rollupOptions: {
      // Node 내장 모듈, sharp(네이티브), core는 외부화
      external: [
        "sharp",
        "@roimark/core",
        ...builtinModules,
        ...builtinModules.map((m) => `node:${m}`),
      ],
    },
    target: "node20",
    sourcemap: true,
    minify: false,
  },
});

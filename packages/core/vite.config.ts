import { defineConfig } from "vite";
import { fileURLToPath } from "url";
import dts from "vite-plugin-dts";

export default defineConfig({
  plugins: [dts({ rollupTypes: true, exclude: ["src/**/__tests__/**"] })],  // TypeScript 선언 파일 생성
  build: {
    lib: {
      entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      name: "RoimarkCore",
      formats: ["es", "cjs"],
      fileName: (format) => `index.${format === "es" ? "js" : "cjs"}`,
    },
    rollupOptions: {
      // YAML 파서는 dependency로 외부화
      external: ["yaml"],
    },
    sourcemap: true,
    minify: false,
  },
});

import { defineConfig } from "vite";
import { fileURLToPath } from "url";
import react from "@vitejs/plugin-react";
import dts from "vite-plugin-dts";

export default defineConfig({
  plugins: [
    react(),
    dts({
      include: ["src/**/*"],
      exclude: ["src/**/__tests__/**"],
      outDir: "dist",
      rollupTypes: true, // 모든 타입을 하나의 index.d.ts로 번들
    }),
  ],
  build: {
    lib: {
      entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      name: "RoimarkReact",
      formats: ["es", "cjs"],
      fileName: (format) => `index.${format === "es" ? "js" : "cjs"}`,
    },
    rollupOptions: {
      // React와 core는 외부화
      external: ["react", "react-dom", "react/jsx-runtime", "@roimark/core", "clsx", "tailwind-merge"],
      output: {
        globals: {
          react: "React",
          "react-dom": "ReactDOM",
          "react/jsx-runtime": "jsxRuntime",
          "@roimark/core": "RoimarkCore",
        },
      },
    },
    sourcemap: true,
    minify: false,
  },
});

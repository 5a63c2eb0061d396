import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      // Map all react-native imports to react-native-web
      "react-native": "react-native-web",
    },
    extensions: [".web.tsx", ".web.ts", ".tsx", ".ts", ".mjs", ".js", ".jsx", ".json"],
  },
  optimizeDeps: {
    include: ["react-native-web"],
    // Prevent esbuild from scanning RN's Flow-typed sources
    exclude: ["react-native"],
  },
});

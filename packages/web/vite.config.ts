import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// Dev requests to /api go to the local analyze server
export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      "/api": {
        target: "http://localhost:8787",
        rewrite: (path) => path.replace(/^\/api/, ""),
      },
    },
  },
});

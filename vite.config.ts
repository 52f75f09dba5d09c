import { resolve } from "node:path";
import { defineConfig } from "vite";

// The sender page. The portal server serves the output from dist/client.
export default defineConfig({
  root: ".",
  build: {
    outDir: resolve("dist/client"),
    emptyOutDir: true,
    target: "es2022",
  },
  server: {
    proxy: {
      // `npm run dev:client` next to a running portal on :8080
      "/ws": { target: "ws://localhost:8080", ws: true },
      "/status": "http://localhost:8080",
    },
  },
});

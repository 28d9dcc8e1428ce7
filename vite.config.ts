import { defineConfig } from "vite";
import { simulatorBridge } from "./src/server/simBridge";

export default defineConfig({
  root: ".",
  base: "./",
  plugins: [simulatorBridge()],
  server: {
    port: 5173,
    open: true,
    strictPort: false,
    hmr: {
      host: "localhost",
      protocol: "ws"
    }
  }
});

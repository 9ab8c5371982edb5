import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./lib"),
      "@tests": path.resolve(__dirname, "./tests"),
    },
  },
  root: __dirname,
  test: {
    environment: "node",
    globals: true,
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "html"],
    },
    exclude: [
      "node_modules/**",
      "dist/**",
      "build/**",
      "coverage/**",
    ],
  },
});

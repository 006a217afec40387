import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["src/**/*.{test,spec}.ts"],
    testTimeout: 20000,
  },
  resolve: {
    alias: {
      "@": path.resolve(root, "./src"),
    },
  },
});

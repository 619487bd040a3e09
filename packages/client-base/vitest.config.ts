import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    root: fileURLToPath(new URL(".", import.meta.url)),
    globals: true,
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    testTimeout: 10_000,
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "sdk",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});

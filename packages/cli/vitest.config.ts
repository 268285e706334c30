import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "cli",
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});

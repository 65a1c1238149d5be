import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/tests/**/*.test.ts"],
    environment: "node"
  }
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@parsnip/parser",
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

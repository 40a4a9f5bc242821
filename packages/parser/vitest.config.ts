import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@bytecomb/parser",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqparse/parser",
    globals: true,
    environment: "node",
  },
});

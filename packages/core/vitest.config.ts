import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqparse/core",
    globals: true,
    environment: "node",
  },
});

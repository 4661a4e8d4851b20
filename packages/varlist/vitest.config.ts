import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqparse/varlist",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fieldmap/core",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fieldmap/schema",
    globals: true,
    environment: "node",
  },
});

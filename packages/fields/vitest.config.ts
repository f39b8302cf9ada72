import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fieldmap/fields",
    globals: true,
    environment: "node",
  },
});

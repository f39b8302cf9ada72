import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fieldmap/mapper",
    globals: true,
    environment: "node",
  },
});

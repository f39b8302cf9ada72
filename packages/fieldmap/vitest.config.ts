import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "fieldmap",
    globals: true,
    environment: "node",
  },
});

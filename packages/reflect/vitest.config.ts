import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@fieldmap/reflect",
    globals: true,
    environment: "node",
    // each provider type-checks its sources against the default lib
    testTimeout: 30000,
  },
});

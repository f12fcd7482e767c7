// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/unit/**/*.spec.ts"],
    // Babylon's first import is slow on cold caches.
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});

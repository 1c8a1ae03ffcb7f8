import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // CLI tests start the entry point through tsx
    testTimeout: 30000,
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",

    // Tests live beside the sources
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],

    // Mock RCON servers bind 127.0.0.1 on ephemeral ports
    testTimeout: 5000,
    hookTimeout: 5000,
  },
});

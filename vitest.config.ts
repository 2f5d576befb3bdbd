import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["app/**/__tests__/**/*.test.ts", "lib/**/__tests__/**/*.test.ts"],
    env: {
      LOG_LEVEL: "error",
      JWT_SECRET: "test-secret",
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent"
    }
  }
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["function-invocation/tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});

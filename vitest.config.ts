import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      CHATBOT_POLICY_LOG_LEVEL: "error",
    },
  },
});

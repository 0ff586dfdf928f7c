import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      PORTAL_LOGIN: "test-login",
      PORTAL_PASSWORD: "test-password",
    },
  },
});

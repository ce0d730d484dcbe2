import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/server/tests/**/*.test.ts"],
    environment: "node",
    env: {
      DEFAULT_TIMEZONE: "UTC",
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "node",
    environment: "node",
    include: ["test/**/*.test.ts"],
    reporters: process.env.CI ? ["verbose"] : ["default"],
    env: {
      FRAMEVAULT_LOG_LEVEL: "silent",
    },
  },
});

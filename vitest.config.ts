import { defineConfig } from "vitest/config";

process.env.LOG_LEVEL ??= "silent";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/**/*.test.ts"],
    testTimeout: 10000,
    env: {
      LOCAL_LOGS: "false",
      LOCAL_STORAGE: "false",
    },
  },
});

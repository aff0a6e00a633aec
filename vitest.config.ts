import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core/src/**/*.test.ts", "common/node/src/**/*.test.ts", "dispatcher/src/**/*.test.ts", "daemon/src/**/*.test.ts"],
    environment: "node",
  },
});

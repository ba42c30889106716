import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
    },
  },
  resolve: {
    alias: {
      "@ragvault/resources": new URL("./packages/resources/src/index.ts", import.meta.url).pathname,
    },
  },
});

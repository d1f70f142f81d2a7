import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
    projects: [
      {
        extends: true,
        test: {
          include: ["packages/*/src/**/*.test.ts"],
          name: "packages",
          environment: "node",
        },
      },
      {
        extends: true,
        test: {
          include: ["apps/server/test/**/*.test.ts"],
          name: "server",
          environment: "node",
        },
      },
    ],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core-db-node/src/**/*.test.ts"],
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tracker-server/tests/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      // Keep test runs from appending to the error log on disk
      ERROR_LOG_FILE: "",
    },
  },
});

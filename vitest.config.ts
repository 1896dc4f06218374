import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Run test files sequentially: the DB singleton is shared per process
    fileParallelism: false,
    // Fixed log level so logger assertions do not depend on the shell
    env: { LOG_LEVEL: "info" },
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./src"),
    },
  },
});

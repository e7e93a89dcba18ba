import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic"
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    setupFiles: ["tests/setup.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      FETCH_TIMEOUT_MS: "200"
    }
  }
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
      CLAUDE_DEFAULT_MODEL: "claude-3-haiku-20240307",
      CLAUDE_DEFAULT_MAX_TOKENS: "1024",
    },
  },
});

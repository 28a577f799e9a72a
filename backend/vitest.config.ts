import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    root: fileURLToPath(new URL(".", import.meta.url)),
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    setupFiles: [],
    env: {
      LOG_LEVEL: "silent",
      ENABLE_OTEL: "false",
      DATABASE_URL: "",
      DOCUMENTS_DATABASE_URL: ""
    }
  }
});

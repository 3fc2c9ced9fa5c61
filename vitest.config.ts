import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  test: {
    name: "salon-calendar-sync",
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      SYNC_LEDGER_PATH: ":memory:",
      SYNC_LOG_LEVEL: "error",
    },
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
});

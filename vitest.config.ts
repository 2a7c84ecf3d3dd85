import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": root,
    },
  },
  test: {
    environment: "node",
    include: ["lib/**/*.test.ts"],
    pool: "forks",
    env: {
      TRANSCRIPT_OPS_LOG: "off",
      TRANSCRIPT_LOG_LEVEL: "silent",
    },
  },
});

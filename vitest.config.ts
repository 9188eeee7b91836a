import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 20000,
    env: { SIGNATURE_LOG_SILENT: "1" },
    // native canvas bindings
    pool: "forks",
  },
  resolve: {
    alias: {
      "@/signature": path.join(rootDir, "signature"),
    },
  },
});

import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/tests/**/*.test.ts"],
    env: {
      STORAGE_DIR: path.join(os.tmpdir(), "caption-qc-test-storage"),
      ASR_PROVIDER: "mock",
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tools/ingest/tests/**/*.test.ts"],
    environment: "node",
  },
});

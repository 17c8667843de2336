import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["oracle/tests/**/*.test.ts", "service/tests/**/*.test.ts"],
    sequence: { concurrent: false },
  },
});

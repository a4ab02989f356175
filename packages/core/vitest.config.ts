import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@simplecas/core",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@simplecas/symbolic",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});

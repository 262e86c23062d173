import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["skills/**/src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts", "packages/**/src/**/*.test.ts"],
    restoreMocks: true,
  },
});

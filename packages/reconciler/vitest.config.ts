import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "reconciler",
    include: ["tests/**/*.test.ts"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["functions/src/**/*.test.ts"],
    environment: "node",
  },
});

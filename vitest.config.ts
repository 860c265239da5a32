import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/src/**/*.test.ts"],
    // Session and provider tests touch temp dirs and fake timers
    pool: "forks",
  },
});

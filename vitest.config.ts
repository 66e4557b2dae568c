import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    env: {
      // Tests that exercise the "now" override set it explicitly.
      MISSION_TIME_NOW: "",
    },
  },
});

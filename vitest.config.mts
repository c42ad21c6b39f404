import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.{test,spec}.?(c|m)[jt]s"],
    typecheck: {
      enabled: true,
      include: ["packages/*/src/**/*.test-d.?(c|m)ts"],
      tsconfig: "./tsconfig.json",
    },
  },
});

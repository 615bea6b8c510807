import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "src/core/**/*.test.ts",
      "src/enhancer/**/*.test.ts",
      "src/exchange/**/*.test.ts",
      "src/rpc/**/*.test.ts",
      "src/server/**/*.test.ts",
      "src/ui/**/*.test.ts",
      "src/*.test.ts",
    ],
  },
});

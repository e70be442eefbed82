import { defineConfig } from "vitest/config";
import isDebugMode from "./_is-debug-mode.js";

export default defineConfig({
  esbuild: {
    target: [
      "es2022",
      "node20",
    ],
  },
  define: {
    __DEBUG__: String(isDebugMode()),
  },
  test: {
    include: [
      "tests/**/*.test.ts",
    ],
  },
});

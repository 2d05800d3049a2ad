import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./backend/nodejs/src", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["backend/**/*.test.ts"],
    env: {
      POWERTOOLS_LOG_LEVEL: "SILENT",
      NO_COLOR: "1",
      AWS_REGION: "us-east-1",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "cdk.out/**",
        "infra/**",
        "node_modules/**",
        "dist/**",
        "**/*.d.ts",
        "coverage/**",
        "**/*.test.ts",
      ],
    },
    setupFiles: [],
  },
});

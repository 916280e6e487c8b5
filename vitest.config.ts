import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["packages/*/src/**/*.ts", "apps/*/src/**/*.ts"],
      exclude: ["**/*.test.ts", "**/*.d.ts"],
    },
  },
  resolve: {
    alias: [
      { find: "@otactl/sdk/testing", replacement: fromRoot("./packages/sdk/src/testing/index.ts") },
      { find: "@otactl/sdk", replacement: fromRoot("./packages/sdk/src/index.ts") },
      { find: "@otactl/shared", replacement: fromRoot("./packages/shared/src/index.ts") },
      { find: "@otactl/core", replacement: fromRoot("./packages/core/src/index.ts") },
    ],
  },
});

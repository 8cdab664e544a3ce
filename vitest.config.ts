import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

function workspace(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      "@ferryman/sdk": workspace("./packages/sdk/src/index.ts"),
      "@ferryman/shared": workspace("./packages/shared/src/index.ts"),
      "@ferryman/providers": workspace("./packages/providers/src/index.ts"),
      "@ferryman/core": workspace("./packages/core/src/index.ts"),
    },
  },
});

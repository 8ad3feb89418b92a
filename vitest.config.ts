import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@argkit/cli-core": fromRoot("./packages/core/src/index.ts"),
      "@argkit/cli-runtime": fromRoot("./packages/cli-runtime/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.spec.ts", "packages/**/src/**/*.test.ts"],
    restoreMocks: true,
  },
});

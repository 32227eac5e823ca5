import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/__tests__/**/*.test.ts"],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: "@clidispatch/sdk/testing", replacement: src("sdk/src/testing/index.ts") },
      { find: "@clidispatch/sdk", replacement: src("sdk/src/index.ts") },
      { find: "@clidispatch/shared", replacement: src("shared/src/index.ts") },
      { find: "@clidispatch/core", replacement: src("core/src/index.ts") },
      { find: "@clidispatch/plugins", replacement: src("plugins/src/index.ts") },
    ],
  },
});

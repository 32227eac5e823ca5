import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string) => fileURLToPath(new URL(`../../packages/${name}/src`, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["__tests__/**/*.test.ts"],
  },
  resolve: {
    alias: [
      { find: "@clidispatch/sdk/testing", replacement: `${pkg("sdk")}/testing/index.ts` },
      { find: "@clidispatch/sdk", replacement: `${pkg("sdk")}/index.ts` },
      { find: "@clidispatch/shared", replacement: `${pkg("shared")}/index.ts` },
      { find: "@clidispatch/core", replacement: `${pkg("core")}/index.ts` },
      { find: "@clidispatch/plugins", replacement: `${pkg("plugins")}/index.ts` },
    ],
  },
});

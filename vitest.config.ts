import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@keystone/core": pkg("core"),
      "@keystone/lang": pkg("lang"),
      "@keystone/engine": pkg("engine"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (dir: string) =>
  fileURLToPath(new URL(`./packages/queuestore/src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": src("application"),
      "@domain": src("domain"),
      "@infra": src("infrastructure"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});

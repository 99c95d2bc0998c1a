import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts", "packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@switchboard/types": pkg("types"),
      "@switchboard/core": pkg("core"),
      "@switchboard/runtime": pkg("runtime"),
      "@switchboard/persistence": pkg("persistence"),
      "@switchboard/skills": pkg("skills"),
    },
  },
});

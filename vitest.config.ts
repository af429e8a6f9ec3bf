import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov"],
    },
    // Resolve workspace packages to their sources
    alias: {
      "@tagwright/kernel": src("kernel"),
      "@tagwright/output": src("output"),
      "@tagwright/directives": src("directives"),
    },
  },
});

import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

export default defineConfig({
  resolve: {
    alias: {
      "@locus/lib": resolve(packagesRoot, "lib/src/lib"),
      "@locus/location": resolve(packagesRoot, "location/src/index.ts"),
    },
  },
  test: {
    include: [
      "packages/*/src/**/__tests__/**/*.test.ts",
      "apps/*/src/**/__tests__/**/*.test.ts",
    ],
    pool: "threads",
  },
});

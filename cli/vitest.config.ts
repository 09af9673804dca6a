import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function source(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url));
}

export default defineConfig({
  resolve: {
    // Workspace packages export dist/ at run time; tests load their sources.
    alias: [
      { find: /^@flowgate\/types$/, replacement: source("../types/src/index.ts") },
      { find: /^@flowgate\/types\/schema$/, replacement: source("../types/src/schema.ts") },
      { find: /^@flowgate\/server$/, replacement: source("../server/src/workflow/index.ts") },
      { find: /^@flowgate\/server\/config$/, replacement: source("../server/src/config.ts") },
    ],
  },
  test: {
    name: "cli",
    watch: false,
    globals: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    isolate: true,
    pool: "forks",
  },
});

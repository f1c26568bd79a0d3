import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts", "packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@agentdeck/types": path.resolve(root, "packages/types/src/index.ts"),
      "@agentdeck/core": path.resolve(root, "packages/core/src/index.ts"),
      "@agentdeck/tools": path.resolve(root, "packages/tools/src/index.ts"),
      "@agentdeck/runtime": path.resolve(root, "packages/runtime/src/index.ts"),
      "@agentdeck/persistence": path.resolve(root, "packages/persistence/src/index.ts"),
    },
  },
});

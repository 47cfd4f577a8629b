import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

// Centralized test config for root tests/*.test.ts.
export default defineConfig({
  resolve: {
    alias: {
      "@fwsync/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@fwsync/discovery": path.join(rootDir, "packages/discovery/src/index.ts"),
      "@fwsync/hcloud": path.join(rootDir, "packages/hcloud/src/index.ts"),
      "@fwsync/controller": path.join(rootDir, "packages/controller/src/index.ts")
    }
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node"
  }
});

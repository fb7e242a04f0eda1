import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspaceSource = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@jobgraph\/core$/, replacement: workspaceSource("./packages/core/src/index.ts") },
      { find: /^@jobgraph\/dag$/, replacement: workspaceSource("./packages/dag/src/index.ts") },
    ],
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
  },
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: "@shardstream/replay/testing", replacement: fromRoot("./packages/replay/src/testing/index.ts") },
      { find: "@shardstream/replay", replacement: fromRoot("./packages/replay/src/index.ts") },
      { find: "@shardstream/receiver", replacement: fromRoot("./packages/receiver/src/index.ts") },
    ],
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.{test,spec}.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});

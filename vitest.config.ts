import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const dir = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@core$/, replacement: dir("./src/core/index.ts") },
      { find: /^@core\//, replacement: dir("./src/core/") },
      { find: /^@domain\//, replacement: dir("./src/core/domain/") },
      { find: /^@services\//, replacement: dir("./src/core/services/") },
      { find: /^@lib\//, replacement: dir("./src/core/lib/") },
      { find: /^@cli\//, replacement: dir("./src/cli/") }
    ]
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node"
  }
});

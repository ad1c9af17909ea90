import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
    server: {
      deps: {
        // clipanion's ESM build imports "../platform" as a directory, which
        // Node's ESM loader rejects; let Vite resolve it instead.
        inline: ["clipanion"],
      },
    },
  },
});

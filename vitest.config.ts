import { defineConfig } from "vitest/config";

// Workspace packages resolve to their TypeScript sources through the "source" export condition
const conditions = ["source"];

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 30000,
  },
});

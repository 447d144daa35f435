import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const packageEntry = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@depthmark/view-core": packageEntry("view-core"),
      "@depthmark/tracking": packageEntry("tracking"),
      "@depthmark/annotator": packageEntry("annotator")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"]
  }
});

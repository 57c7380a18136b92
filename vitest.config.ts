import path from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(process.cwd(), "book-identifier/src")
    }
  },
  test: {
    include: ["book-identifier/tests/**/*.test.ts"],
    environment: "node"
  }
});

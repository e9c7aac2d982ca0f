import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"]
  },
  resolve: {
    alias: {
      "@reltime/calendar": fileURLToPath(new URL("./packages/calendar/src/index.ts", import.meta.url)),
      "@reltime/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url))
    }
  }
});

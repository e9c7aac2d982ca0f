import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"]
  },
  resolve: {
    alias: {
      "@reltime/calendar": fileURLToPath(new URL("../calendar/src/index.ts", import.meta.url))
    }
  }
});

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  dts: false,
  noExternal: ["@reltime/core", "@reltime/calendar"],
  banner: {
    js: "#!/usr/bin/env node"
  }
});

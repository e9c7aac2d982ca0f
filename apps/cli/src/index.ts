import { fileURLToPath } from "node:url";
import { loadDotEnv } from "./config.js";
import { runCli } from "./program.js";

const REPO_ROOT = fileURLToPath(new URL("../../..", import.meta.url));

loadDotEnv([REPO_ROOT, process.cwd()]);

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text)
});

#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { formatError } from "./format.js";
import { EXIT_ERROR, buildProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[tracelock] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[tracelock] Uncaught exception:", err);
  process.exit(1);
});

try {
  await buildProgram({ config: loadConfig() }).parseAsync(process.argv);
} catch (err) {
  console.error(`[tracelock] ${formatError(err)}`);
  process.exitCode = EXIT_ERROR;
}

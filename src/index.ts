#!/usr/bin/env node
/**
 * liftoff: launch the flight-controller services and supervise them.
 *
 * This is the main entry point. It bootstraps the CLI program,
 * installs error handlers, and delegates to Commander.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";

const program = buildProgram();

process.on("uncaughtException", (error) => {
  console.error(
    "[liftoff] Uncaught exception:",
    error instanceof Error ? (error.stack ?? error.message) : error,
  );
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(
    "[liftoff] Unhandled rejection:",
    reason instanceof Error ? (reason.stack ?? reason.message) : reason,
  );
  process.exit(1);
});

void program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[liftoff] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});

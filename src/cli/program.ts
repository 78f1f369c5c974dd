/**
 * CLI program definition for liftoff.
 *
 * Uses Commander to define the command structure. Running `liftoff` with no
 * arguments launches the services from the current directory.
 */
import { Command, InvalidArgumentError } from "commander";
import path from "node:path";
import { VERSION } from "../version.js";
import { loadConfig, resolveLogDir, resolveStateDir, type LiftoffConfig } from "../config/index.js";
import { runLauncher, runPreflight } from "../launcher/run.js";
import { createLogger, isLogLevel, type Logger } from "../shared/logger.js";
import type { LogLevel } from "../shared/types.js";

export interface CliOptions {
  projectDir?: string;
  config?: string;
  delay?: number;
  killAfter?: number;
  logLevel?: LogLevel;
}

/** Extra dependencies for tests; production uses the defaults. */
export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  launch?: typeof runLauncher;
  preflight?: typeof runPreflight;
}

function parseMillis(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("must be a non-negative integer (milliseconds)");
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("must be one of fatal, error, warn, info, debug, trace");
  }
  return value;
}

function addSharedOptions(command: Command): Command {
  return command
    .option("--project-dir <path>", "directory holding the service scripts (default: cwd)")
    .option("--config <path>", "config file, relative to the project dir (default: liftoff.yaml)")
    .option("--log-level <level>", "minimum log level", parseLogLevel);
}

export function buildProgram(
  onExit: (code: number) => void = (code) => {
    process.exitCode = code;
  },
  deps: CliDeps = {},
): Command {
  const program = new Command();

  addSharedOptions(
    program
      .name("liftoff")
      .description("Start the TCP proxy and flight simulator together and stop them together")
      .version(VERSION)
      .enablePositionalOptions(),
  )
    .option("--delay <ms>", "head-start between launches in milliseconds", parseMillis)
    .option("--kill-after <ms>", "SIGKILL children still running this long after shutdown", parseMillis)
    .action(async (opts: CliOptions) => {
      onExit(await handleRun(opts, deps));
    });

  addSharedOptions(
    program.command("check").description("check that the required files exist, then exit"),
  ).action((opts: CliOptions) => {
    onExit(handleCheck(opts, deps));
  });

  return program;
}

interface Resolved {
  projectDir: string;
  config: LiftoffConfig;
  logger: Logger;
}

export function resolveRun(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): Resolved {
  const projectDir = path.resolve(opts.projectDir ?? process.cwd());
  const loaded = loadConfig(projectDir, { configPath: opts.config, env });

  const config: LiftoffConfig = {
    ...loaded,
    startDelayMs: opts.delay ?? loaded.startDelayMs,
    shutdown: { ...loaded.shutdown, killAfterMs: opts.killAfter ?? loaded.shutdown.killAfterMs },
    logging: { ...loaded.logging, level: opts.logLevel ?? loaded.logging.level },
  };

  const logger = createLogger(
    {},
    {
      level: config.logging.level,
      fileOutput: config.logging.file,
      logDir: resolveLogDir(resolveStateDir(env)),
    },
  );

  return { projectDir, config, logger };
}

export async function handleRun(opts: CliOptions, deps: CliDeps = {}): Promise<number> {
  const resolved = resolveRun(opts, deps.env);
  const launch = deps.launch ?? runLauncher;
  return launch(resolved);
}

export function handleCheck(opts: CliOptions, deps: CliDeps = {}): number {
  const resolved = resolveRun(opts, deps.env);
  const preflight = deps.preflight ?? runPreflight;
  return preflight(resolved);
}

/**
 * The liftoff launcher: preflight, ordered launch, wait, shutdown.
 *
 * Returns the process exit code instead of exiting so the CLI stays the
 * only place that touches process.exitCode.
 */
import type { LiftoffConfig } from "../config/index.js";
import { LaunchError, MissingFileError } from "../process/errors.js";
import type { ManagedProcess, SpawnFn } from "../process/managed-process.js";
import type { SignalSource } from "../process/signals.js";
import { Supervisor } from "../process/supervisor.js";
import type { Logger } from "../shared/logger.js";
import type { TerminationReport } from "../shared/types.js";
import { toLaunchSpecs } from "./specs.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

const RULE = "=".repeat(46);

export interface LauncherOptions {
  /** Directory the required files and scripts are resolved against. */
  projectDir: string;
  config: LiftoffConfig;
  logger: Logger;
  spawn?: SpawnFn;
  signals?: SignalSource;
}

/** Run only the preflight checks. Returns the exit code. */
export function runPreflight(options: Omit<LauncherOptions, "spawn" | "signals">): number {
  const supervisor = new Supervisor({ logger: options.logger });
  return checkRequiredFiles(supervisor, options) ? EXIT_OK : EXIT_FAILURE;
}

export async function runLauncher(options: LauncherOptions): Promise<number> {
  const { config, logger, projectDir } = options;

  logger.info(`Starting ${config.title} Services`);
  logger.info(RULE);

  const supervisor = new Supervisor({
    logger,
    spawn: options.spawn,
    signals: options.signals,
    startDelayMs: config.startDelayMs,
    shutdownSignal: config.shutdown.signal,
    killAfterMs: config.shutdown.killAfterMs,
  });

  if (!checkRequiredFiles(supervisor, options)) {
    return EXIT_FAILURE;
  }

  const specs = toLaunchSpecs(config, projectDir);
  const labels = new Map(specs.map((spec) => [spec.name, spec.label ?? spec.name]));

  let report: TerminationReport;
  try {
    report = await supervisor.run(specs, {
      onRunning: (processes) => printRunning(logger, config, processes),
    });
  } catch (error: unknown) {
    if (error instanceof LaunchError) {
      logger.error(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  if (report.reason === "signal") {
    logger.info("Services stopped");
  } else {
    logger.info("All services exited");
  }
  for (const proc of report.processes) {
    const status = proc.exitSignal
      ? `signal ${proc.exitSignal}`
      : `code ${proc.exitCode ?? "unknown"}`;
    logger.debug(`${labels.get(proc.name) ?? proc.name}: ${proc.state} (${status})`);
  }
  return EXIT_OK;
}

function printRunning(
  logger: Logger,
  config: LiftoffConfig,
  processes: readonly ManagedProcess[],
): void {
  logger.info("All services are running:");
  for (const proc of processes) {
    logger.info(`   - ${proc.label} PID: ${proc.pid ?? "unknown"}`);
  }
  if (config.visualizer) {
    logger.info("To start the visualizer, run in another terminal:");
    logger.info(`   ${config.runtime} ${config.visualizer}`);
  }
  logger.info("Press Ctrl+C to stop all services");
  logger.info(RULE);
}

function checkRequiredFiles(
  supervisor: Supervisor,
  { config, logger, projectDir }: Pick<LauncherOptions, "config" | "logger" | "projectDir">,
): boolean {
  try {
    supervisor.preflight(config.requiredFiles, projectDir);
  } catch (error: unknown) {
    if (error instanceof MissingFileError) {
      for (const file of error.missing) {
        logger.error(`Error: ${file} not found`);
      }
      return false;
    }
    throw error;
  }
  logger.info("All required files found");
  return true;
}

/**
 * Shared utilities for liftoff.
 */
export type {
  LogEntry,
  LogLevel,
  ProcessExit,
  ProcessSpec,
  ProcessState,
  ProcessSummary,
  TerminationReason,
  TerminationReport,
  TerminationSignal,
} from "./types.js";
export { LOG_LEVELS, PROCESS_STATES, TERMINATION_SIGNALS } from "./types.js";
export { Logger, createLogger, isLogLevel } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
export { sleep } from "./sleep.js";

/**
 * Shared TypeScript types for liftoff.
 *
 * Defines the core data structures used across the supervisor:
 * managed process lifecycle, launch specs, termination reports and log entries.
 */

// ---------------------------------------------------------------------------
// Process lifecycle
// ---------------------------------------------------------------------------

export const PROCESS_STATES = ["starting", "running", "stopping", "stopped"] as const;

export type ProcessState = (typeof PROCESS_STATES)[number];

/** Termination signals the supervisor listens for and forwards. */
export const TERMINATION_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export type TerminationSignal = (typeof TERMINATION_SIGNALS)[number];

export interface ProcessExit {
  /** Exit status, or null when the child was ended by a signal. */
  exitCode: number | null;
  /** Signal that ended the child, if any. */
  exitSignal: NodeJS.Signals | null;
}

export interface ProcessSummary extends ProcessExit {
  name: string;
  pid: number | undefined;
  state: ProcessState;
}

// ---------------------------------------------------------------------------
// Launch specs
// ---------------------------------------------------------------------------

export interface ProcessSpec {
  /** Identifier used in logs and reports (e.g. "proxy"). */
  name: string;
  /** Human-readable name (e.g. "TCP Proxy"). Defaults to name. */
  label?: string;
  /** Executable to run (e.g. "python"). */
  command: string;
  /** Arguments passed to the executable. */
  args?: string[];
  /** Working directory for the child. */
  cwd?: string;
  /** Environment for the child. Defaults to the supervisor's environment. */
  env?: NodeJS.ProcessEnv;
}

// ---------------------------------------------------------------------------
// Termination
// ---------------------------------------------------------------------------

export type TerminationReason = "exited" | "signal";

export interface TerminationReport {
  /** Why the wait ended. */
  reason: TerminationReason;
  /** The signal received, when reason is "signal". */
  signal?: TerminationSignal;
  processes: ProcessSummary[];
}

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Service that emitted the log, empty for the supervisor itself. */
  service: string;
  /** Human-readable message. */
  msg: string;
}

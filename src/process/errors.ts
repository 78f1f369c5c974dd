/**
 * Error types raised by the process supervisor.
 */
import type { ProcessState } from "../shared/types.js";

export class MissingFileError extends Error {
  /** Every required file that was absent, in the order they were checked. */
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`${missing[0] ?? "required file"} not found`);
    this.name = "MissingFileError";
    this.missing = missing;
  }
}

export class LaunchError extends Error {
  readonly processName: string;
  readonly cause: unknown;

  constructor(processName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to launch ${processName}: ${reason}`);
    this.name = "LaunchError";
    this.processName = processName;
    this.cause = cause;
  }
}

/** A child exited with a non-zero status while the supervisor was waiting. */
export class ChildExitError extends Error {
  readonly processName: string;
  readonly exitCode: number | null;
  readonly exitSignal: NodeJS.Signals | null;

  constructor(processName: string, exitCode: number | null, exitSignal: NodeJS.Signals | null) {
    const status = exitSignal ? `signal ${exitSignal}` : `code ${exitCode ?? "unknown"}`;
    super(`${processName} exited unexpectedly (${status})`);
    this.name = "ChildExitError";
    this.processName = processName;
    this.exitCode = exitCode;
    this.exitSignal = exitSignal;
  }
}

export class InvalidTransitionError extends Error {
  readonly from: ProcessState;
  readonly to: ProcessState;

  constructor(processName: string, from: ProcessState, to: ProcessState) {
    super(`${processName}: invalid state transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class ReadinessTimeoutError extends Error {
  readonly processName: string;
  readonly timeoutMs: number;

  constructor(processName: string, target: string, timeoutMs: number) {
    super(`${processName} did not become ready on ${target} within ${timeoutMs}ms`);
    this.name = "ReadinessTimeoutError";
    this.processName = processName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Process management for liftoff.
 *
 * Handles child process lifecycle, ordered launch and signal forwarding.
 */
export { Supervisor, preflight } from "./supervisor.js";
export type { LaunchOptions, LaunchSpec, RunOptions, SupervisorOptions } from "./supervisor.js";
export { ManagedProcess } from "./managed-process.js";
export type { ChildHandle, SpawnFn } from "./managed-process.js";
export { fixedDelay, tcpPort, DEFAULT_START_DELAY_MS } from "./readiness.js";
export type { ReadinessProbe, TcpProbeOptions } from "./readiness.js";
export { installSignalHandlers } from "./signals.js";
export type { SignalHandler, SignalSource } from "./signals.js";
export {
  ChildExitError,
  InvalidTransitionError,
  LaunchError,
  MissingFileError,
  ReadinessTimeoutError,
} from "./errors.js";

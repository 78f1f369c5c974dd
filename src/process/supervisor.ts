/**
 * Process supervisor.
 *
 * Launches an ordered set of children, waits until they all exit or the
 * supervisor is asked to terminate, and forwards termination to every child
 * that is still alive. No child outlives a supervisor that completes
 * shutdown().
 */
import fs from "node:fs";
import path from "node:path";
import { spawn as nodeSpawn } from "node:child_process";
import { createLogger, type Logger } from "../shared/logger.js";
import {
  TERMINATION_SIGNALS,
  type ProcessExit,
  type ProcessSpec,
  type ProcessSummary,
  type TerminationReport,
  type TerminationSignal,
} from "../shared/types.js";
import { ChildExitError, LaunchError, MissingFileError } from "./errors.js";
import { ManagedProcess, type SpawnFn } from "./managed-process.js";
import { fixedDelay, DEFAULT_START_DELAY_MS, type ReadinessProbe } from "./readiness.js";
import { installSignalHandlers, type SignalSource } from "./signals.js";

export interface LaunchSpec extends ProcessSpec {
  /**
   * Awaited after this process starts and before the next one launches.
   * Defaults to a fixed delay of `startDelayMs`.
   */
  readiness?: ReadinessProbe;
}

export interface LaunchOptions {
  /** Stops further launches when aborted. */
  signal?: AbortSignal;
}

export interface RunOptions {
  /** Called once every process has launched, before waiting. */
  onRunning?: (processes: readonly ManagedProcess[]) => void;
}

export interface SupervisorOptions {
  logger?: Logger;
  /** Defaults to child_process.spawn. */
  spawn?: SpawnFn;
  /** Where termination signals come from. Defaults to the current process. */
  signals?: SignalSource;
  /** Head-start given to each process before the next launches. Defaults to 2000. */
  startDelayMs?: number;
  /** Signal forwarded to children on shutdown. Defaults to SIGTERM. */
  shutdownSignal?: NodeJS.Signals;
  /**
   * Send SIGKILL to children still alive this long after the shutdown
   * signal. Unset means wait for them indefinitely.
   */
  killAfterMs?: number;
}

/**
 * Check that every file in `requiredFiles` exists as a regular file,
 * resolved against `cwd`.
 *
 * @throws MissingFileError listing every absent file in input order.
 */
export function preflight(requiredFiles: Iterable<string>, cwd: string = process.cwd()): void {
  const missing: string[] = [];
  for (const file of requiredFiles) {
    if (!fs.statSync(path.resolve(cwd, file), { throwIfNoEntry: false })?.isFile()) {
      missing.push(file);
    }
  }
  if (missing.length > 0) {
    throw new MissingFileError(missing);
  }
}

export class Supervisor {
  private readonly logger: Logger;
  private readonly spawnFn: SpawnFn;
  private readonly signalSource: SignalSource;
  private readonly startDelayMs: number;
  private readonly shutdownSignal: NodeJS.Signals;
  private readonly killAfterMs: number | undefined;
  private readonly tracked = new Map<string, ManagedProcess>();
  private inFlightShutdown: Promise<ProcessSummary[]> | null = null;

  constructor(options: SupervisorOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.spawnFn = options.spawn ?? nodeSpawn;
    this.signalSource = options.signals ?? process;
    this.startDelayMs = options.startDelayMs ?? DEFAULT_START_DELAY_MS;
    this.shutdownSignal = options.shutdownSignal ?? "SIGTERM";
    this.killAfterMs = options.killAfterMs;
  }

  /** Processes launched by this supervisor, in launch order. */
  get processes(): ManagedProcess[] {
    return [...this.tracked.values()];
  }

  preflight(requiredFiles: Iterable<string>, cwd?: string): void {
    preflight(requiredFiles, cwd);
  }

  /**
   * Launch `specs` strictly in order, waiting for each one's readiness
   * before starting the next.
   *
   * On failure every process launched by this call is shut down before the
   * LaunchError is thrown, and no later spec is spawned. Aborting
   * `options.signal` stops launching and returns what was started so far.
   */
  async launchOrdered(
    specs: readonly LaunchSpec[],
    options: LaunchOptions = {},
  ): Promise<ManagedProcess[]> {
    const names = new Set<string>();
    for (const spec of specs) {
      if (names.has(spec.name) || this.tracked.has(spec.name)) {
        throw new Error(`Duplicate process name '${spec.name}'`);
      }
      names.add(spec.name);
    }

    const cancel = options.signal;
    const launched: ManagedProcess[] = [];
    try {
      for (const [index, spec] of specs.entries()) {
        const previous = launched.at(-1);
        const previousSpec = specs[index - 1];
        if (previous && previousSpec) {
          await this.waitUntilReady(previous, previousSpec, cancel);
        }
        if (cancel?.aborted) break;
        launched.push(await this.launchOne(spec));
      }
    } catch (error: unknown) {
      const failed = specs[launched.length]?.name ?? "process";
      const launchError = error instanceof LaunchError ? error : new LaunchError(failed, error);
      if (launched.length > 0) {
        this.logger.warn(`Stopping ${launched.length} already launched process(es)`);
        await this.shutdown(launched);
      }
      throw launchError;
    }
    return launched;
  }

  /**
   * Wait until every process has exited, or until SIGINT/SIGTERM arrives.
   *
   * A termination signal starts shutdown(); repeated signals join the same
   * shutdown. Handlers are removed once the wait and any shutdown finish.
   */
  awaitTermination(processes: readonly ManagedProcess[]): Promise<TerminationReport> {
    return new Promise((resolve, reject) => {
      let signalled = false;
      let settled = false;

      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        dispose();
        outcome();
      };

      const dispose = installSignalHandlers(this.signalSource, TERMINATION_SIGNALS, (signal) => {
        this.logger.info(`Received ${signal}`);
        signalled = true;
        this.shutdown(processes).then(
          (summaries) => settle(() => resolve({ reason: "signal", signal, processes: summaries })),
          (error: unknown) => settle(() => reject(error)),
        );
      });

      for (const proc of processes) {
        void proc.whenExited().then((exit) => this.reportExit(proc, exit));
      }

      void Promise.all(processes.map((proc) => proc.whenExited())).then(() => {
        if (signalled) return;
        settle(() =>
          resolve({ reason: "exited", processes: processes.map((proc) => proc.toSummary()) }),
        );
      });
    });
  }

  /**
   * Forward `signal` to every process that is not already stopping or
   * stopped, then wait for all of them to exit.
   *
   * Calls made while a shutdown is in progress share its result: their own
   * `processes` and `signal` are ignored and the first call's are used.
   */
  shutdown(
    processes: readonly ManagedProcess[] = this.processes,
    signal: NodeJS.Signals = this.shutdownSignal,
  ): Promise<ProcessSummary[]> {
    if (this.inFlightShutdown) return this.inFlightShutdown;

    const run = async (): Promise<ProcessSummary[]> => {
      if (processes.some((proc) => !proc.isStopped)) {
        this.logger.info("Shutting down services...");
      }
      for (const proc of processes) {
        if (proc.signal(signal)) {
          this.logger.debug(`Sent ${signal} to ${proc.name} (PID: ${proc.pid ?? "unknown"})`);
        }
      }
      await this.waitForExit(processes, signal);
      for (const proc of processes) {
        this.tracked.delete(proc.name);
      }
      return processes.map((proc) => proc.toSummary());
    };

    const pending = run().finally(() => {
      this.inFlightShutdown = null;
    });
    this.inFlightShutdown = pending;
    return pending;
  }

  /**
   * Launch, wait for termination, and make sure everything is stopped.
   *
   * Signal handlers cover the whole run: a signal during launch cancels the
   * remaining launches and shuts down what already started, and the handlers
   * stay installed until that shutdown settles.
   */
  async run(specs: readonly LaunchSpec[], options: RunOptions = {}): Promise<TerminationReport> {
    const cancel = new AbortController();
    const early: { signal?: TerminationSignal } = {};
    const dispose = installSignalHandlers(this.signalSource, TERMINATION_SIGNALS, (signal) => {
      this.logger.info(`Received ${signal}`);
      early.signal ??= signal;
      cancel.abort();
    });

    let processes: ManagedProcess[];
    try {
      processes = await this.launchOrdered(specs, { signal: cancel.signal });
      if (early.signal) {
        const summaries = await this.shutdown(processes);
        return { reason: "signal", signal: early.signal, processes: summaries };
      }
    } finally {
      dispose();
    }

    options.onRunning?.(processes);
    const report = await this.awaitTermination(processes);
    const summaries = await this.shutdown(processes);
    return { ...report, processes: summaries };
  }

  private async launchOne(spec: LaunchSpec): Promise<ManagedProcess> {
    let proc: ManagedProcess;
    try {
      proc = ManagedProcess.spawn(spec, this.spawnFn);
    } catch (error: unknown) {
      throw new LaunchError(spec.name, error);
    }
    this.tracked.set(spec.name, proc);

    try {
      await proc.whenStarted();
    } catch (error: unknown) {
      this.tracked.delete(spec.name);
      throw error;
    }
    this.logger.info(`${proc.label} started (PID: ${proc.pid ?? "unknown"})`);
    return proc;
  }

  private async waitUntilReady(
    proc: ManagedProcess,
    spec: LaunchSpec,
    cancel: AbortSignal | undefined,
  ): Promise<void> {
    if (cancel?.aborted) return;
    const probe = spec.readiness ?? fixedDelay(this.startDelayMs);
    const controller = new AbortController();
    const onCancel = (): void => controller.abort(cancel?.reason);
    cancel?.addEventListener("abort", onCancel, { once: true });
    // The default head-start runs out even if the process exits; its exit is
    // reported once the supervisor waits on it. Explicit probes fail instead.
    if (spec.readiness) {
      void proc.whenExited().then(() => {
        controller.abort(new Error(`${proc.name} exited during start-up`));
      });
    }

    try {
      await probe(proc, controller.signal);
    } catch (error: unknown) {
      if (cancel?.aborted) return;
      throw new LaunchError(proc.name, controller.signal.aborted ? controller.signal.reason : error);
    } finally {
      cancel?.removeEventListener("abort", onCancel);
      controller.abort();
    }
  }

  private reportExit(proc: ManagedProcess, exit: ProcessExit): void {
    if (proc.wasStopRequested) return;
    if (exit.exitCode === 0) {
      this.logger.info(`${proc.label} exited`);
    } else {
      this.logger.warn(new ChildExitError(proc.name, exit.exitCode, exit.exitSignal).message);
    }
  }

  private async waitForExit(
    processes: readonly ManagedProcess[],
    signal: NodeJS.Signals,
  ): Promise<void> {
    const allExited = Promise.all(processes.map((proc) => proc.whenExited()));
    if (this.killAfterMs === undefined) {
      await allExited;
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const graceExpired = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.killAfterMs);
    });
    try {
      const outcome = await Promise.race([allExited.then(() => "exited" as const), graceExpired]);
      if (outcome === "timeout") {
        for (const proc of processes) {
          if (!proc.isStopped) {
            this.logger.warn(`${proc.name} ignored ${signal}; sending SIGKILL`);
            proc.kill();
          }
        }
        await allExited;
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

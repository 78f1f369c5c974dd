/**
 * A single supervised child process.
 *
 * Owns the child handle and enforces the lifecycle
 *   starting -> running -> stopping -> stopped
 * with the shortcuts starting -> stopped (spawn failure, immediate crash)
 * and running -> stopped (the child exited on its own).
 */
import type { SpawnOptions } from "node:child_process";
import type { ProcessExit, ProcessSpec, ProcessState, ProcessSummary } from "../shared/types.js";
import { InvalidTransitionError, LaunchError } from "./errors.js";

/** The part of a ChildProcess the supervisor relies on. */
export interface ChildHandle {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: "spawn", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(
    event: "exit",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildHandle;

const ALLOWED_TRANSITIONS: Record<ProcessState, readonly ProcessState[]> = {
  starting: ["running", "stopped"],
  running: ["stopping", "stopped"],
  stopping: ["stopped"],
  stopped: [],
};

interface StartWaiter {
  resolve: () => void;
  reject: (error: LaunchError) => void;
}

export class ManagedProcess {
  readonly name: string;
  readonly label: string;
  /** Epoch milliseconds of the spawn request. */
  readonly startedAt: number;

  private state: ProcessState = "starting";
  private readonly history: ProcessState[] = ["starting"];
  private exitRecord: ProcessExit | undefined;
  private launchFailure: LaunchError | undefined;
  private pendingSignal: NodeJS.Signals | undefined;
  private stopRequested = false;
  private readonly startWaiters: StartWaiter[] = [];
  private readonly exitWaiters: Array<(exit: ProcessExit) => void> = [];

  constructor(
    spec: ProcessSpec,
    private readonly child: ChildHandle,
    now: () => number = Date.now,
  ) {
    this.name = spec.name;
    this.label = spec.label ?? spec.name;
    this.startedAt = now();

    child.on("spawn", () => this.onSpawn());
    child.on("error", (err) => this.onError(err));
    child.on("exit", (code, signal) => this.onExit({ exitCode: code, exitSignal: signal }));
  }

  /** Spawn `spec` with `spawnFn` and wrap the resulting child. */
  static spawn(spec: ProcessSpec, spawnFn: SpawnFn): ManagedProcess {
    const child = spawnFn(spec.command, spec.args ?? [], {
      cwd: spec.cwd,
      env: spec.env,
      stdio: "inherit",
    });
    return new ManagedProcess(spec, child);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get currentState(): ProcessState {
    return this.state;
  }

  /** Every state this process has been in, oldest first. */
  get transitions(): readonly ProcessState[] {
    return this.history;
  }

  get exit(): ProcessExit | undefined {
    return this.exitRecord;
  }

  /** Whether the supervisor asked this process to stop. */
  get wasStopRequested(): boolean {
    return this.stopRequested;
  }

  get isStopped(): boolean {
    return this.state === "stopped";
  }

  /** Resolves once the OS confirmed the spawn; rejects if it never started. */
  whenStarted(): Promise<void> {
    if (this.launchFailure) return Promise.reject(this.launchFailure);
    if (this.state !== "starting") return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.startWaiters.push({ resolve, reject });
    });
  }

  /** Resolves with the exit record once the process is stopped. Never rejects. */
  whenExited(): Promise<ProcessExit> {
    if (this.exitRecord) return Promise.resolve(this.exitRecord);
    return new Promise((resolve) => {
      this.exitWaiters.push(resolve);
    });
  }

  /**
   * Ask the process to terminate.
   *
   * Returns false when nothing was sent because the process is already
   * stopping or stopped. A signal requested while starting is delivered
   * as soon as the spawn is confirmed.
   */
  signal(signal: NodeJS.Signals = "SIGTERM"): boolean {
    switch (this.state) {
      case "stopped":
      case "stopping":
        return false;
      case "starting":
        if (this.pendingSignal) return false;
        this.pendingSignal = signal;
        this.stopRequested = true;
        return true;
      case "running":
        this.stopRequested = true;
        this.transition("stopping");
        this.child.kill(signal);
        return true;
    }
  }

  /** Force-kill a process that ignored its termination signal. */
  kill(): boolean {
    if (this.state === "stopped") return false;
    if (this.state === "running") {
      this.stopRequested = true;
      this.transition("stopping");
    }
    return this.child.kill("SIGKILL");
  }

  toSummary(): ProcessSummary {
    return {
      name: this.name,
      pid: this.pid,
      state: this.state,
      exitCode: this.exitRecord?.exitCode ?? null,
      exitSignal: this.exitRecord?.exitSignal ?? null,
    };
  }

  private onSpawn(): void {
    if (this.state !== "starting") return;
    this.transition("running");
    for (const waiter of this.startWaiters.splice(0)) {
      waiter.resolve();
    }

    const pending = this.pendingSignal;
    if (pending) {
      this.pendingSignal = undefined;
      this.transition("stopping");
      this.child.kill(pending);
    }
  }

  private onError(err: Error): void {
    if (this.state !== "starting") return;
    // No spawn event will follow, and Node may not emit "exit" either.
    this.fail(new LaunchError(this.name, err), { exitCode: null, exitSignal: null });
  }

  private onExit(exit: ProcessExit): void {
    if (this.state === "stopped") return;
    if (this.state === "starting") {
      const status = exit.exitSignal ?? `code ${exit.exitCode ?? "unknown"}`;
      this.fail(new LaunchError(this.name, `exited before start (${status})`), exit);
      return;
    }
    this.settle(exit);
  }

  private fail(error: LaunchError, exit: ProcessExit): void {
    this.launchFailure = error;
    for (const waiter of this.startWaiters.splice(0)) {
      waiter.reject(error);
    }
    this.settle(exit);
  }

  private settle(exit: ProcessExit): void {
    const record: ProcessExit = Object.freeze({ ...exit });
    this.exitRecord = record;
    this.transition("stopped");
    for (const resolve of this.exitWaiters.splice(0)) {
      resolve(record);
    }
  }

  private transition(to: ProcessState): void {
    if (!ALLOWED_TRANSITIONS[this.state].includes(to)) {
      throw new InvalidTransitionError(this.name, this.state, to);
    }
    this.state = to;
    this.history.push(to);
  }
}

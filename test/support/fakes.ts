/**
 * In-process stand-ins for child processes and process signals.
 *
 * FakeChild behaves like a ChildProcess as far as the supervisor can see:
 * it emits "spawn", "error" and "exit" and records every kill() call.
 */
import { EventEmitter } from "node:events";
import type { SpawnOptions } from "node:child_process";
import type { ChildHandle, SpawnFn } from "../../src/process/managed-process.js";
import type { SignalHandler, SignalSource } from "../../src/process/signals.js";

export class FakeChild extends EventEmitter implements ChildHandle {
  pid: number | undefined;
  readonly kills: Array<NodeJS.Signals | number | undefined> = [];
  /** When false the child ignores everything but SIGKILL. */
  exitOnSignal = true;

  constructor(pid?: number) {
    super();
    this.pid = pid;
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.kills.push(signal);
    if (this.exitOnSignal || signal === "SIGKILL") {
      const exitSignal: NodeJS.Signals = typeof signal === "string" ? signal : "SIGTERM";
      queueMicrotask(() => this.emit("exit", null, exitSignal));
    }
    return true;
  }

  start(): void {
    this.emit("spawn");
  }

  fail(message = "spawn python ENOENT"): void {
    this.emit("error", new Error(message));
  }

  exitWith(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit("exit", code, signal);
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
  child: FakeChild;
}

export interface FakeSpawnerOptions {
  /** Emit "spawn" on the next microtask. Defaults to true. */
  autoStart?: boolean;
  /** Scripts (first argument) whose spawn emits "error" instead. */
  failing?: string[];
  /** Scripts whose spawn throws synchronously. */
  throwing?: string[];
  firstPid?: number;
}

export class FakeSpawner {
  readonly calls: SpawnCall[] = [];
  private nextPid: number;
  private readonly autoStart: boolean;
  private readonly failing: Set<string>;
  private readonly throwing: Set<string>;

  constructor(options: FakeSpawnerOptions = {}) {
    this.autoStart = options.autoStart ?? true;
    this.failing = new Set(options.failing ?? []);
    this.throwing = new Set(options.throwing ?? []);
    this.nextPid = options.firstPid ?? 4100;
  }

  readonly spawn: SpawnFn = (command, args, options) => {
    const script = args[0] ?? command;
    if (this.throwing.has(script)) {
      throw new Error(`spawn ${command} EINVAL`);
    }
    const fails = this.failing.has(script);
    const child = new FakeChild(fails ? undefined : this.nextPid++);
    this.calls.push({ command, args, options, child });
    queueMicrotask(() => {
      if (fails) {
        child.fail(`spawn ${command} ENOENT`);
      } else if (this.autoStart) {
        child.start();
      }
    });
    return child;
  };

  child(index: number): FakeChild {
    const call = this.calls[index];
    if (!call) throw new Error(`no spawn call #${index}`);
    return call.child;
  }
}

export class FakeSignalSource implements SignalSource {
  private readonly emitter = new EventEmitter();

  on(signal: NodeJS.Signals, handler: SignalHandler): this {
    this.emitter.on(signal, handler);
    return this;
  }

  off(signal: NodeJS.Signals, handler: SignalHandler): this {
    this.emitter.off(signal, handler);
    return this;
  }

  raise(signal: NodeJS.Signals): void {
    this.emitter.emit(signal, signal);
  }

  listenerCount(signal: NodeJS.Signals): number {
    return this.emitter.listenerCount(signal);
  }
}

/** Let pending microtasks and I/O callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

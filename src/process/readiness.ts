/**
 * Readiness probes run between ordered launches.
 *
 * A probe resolves once the process it watches may be depended on.
 * The default is a fixed head-start: it only guarantees that time passed,
 * not that the process finished initializing.
 */
import net from "node:net";
import type { ManagedProcess } from "./managed-process.js";
import { sleep } from "../shared/sleep.js";
import { ReadinessTimeoutError } from "./errors.js";

/**
 * `signal` aborts when the watched process exits before the probe settles,
 * or when the launch is cancelled.
 */
export type ReadinessProbe = (proc: ManagedProcess, signal: AbortSignal) => Promise<void>;

export const DEFAULT_START_DELAY_MS = 2000;

/** Give the process a head-start of `ms`. */
export function fixedDelay(ms: number = DEFAULT_START_DELAY_MS): ReadinessProbe {
  return async (_proc, signal) => {
    await sleep(ms, signal);
  };
}

export interface TcpProbeOptions {
  host?: string;
  port: number;
  /** Give up after this long. Defaults to 10000. */
  timeoutMs?: number;
  /** Pause between connection attempts. Defaults to 200. */
  intervalMs?: number;
}

/** Poll until a TCP connection to host:port succeeds. */
export function tcpPort(options: TcpProbeOptions): ReadinessProbe {
  const host = options.host ?? "127.0.0.1";
  const timeoutMs = options.timeoutMs ?? 10_000;
  const intervalMs = options.intervalMs ?? 200;
  const target = `${host}:${options.port}`;

  return async (proc, signal) => {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      signal.throwIfAborted();
      if (await canConnect(host, options.port)) return;
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ReadinessTimeoutError(proc.name, target, timeoutMs);
      }
      await sleep(Math.min(intervalMs, remaining), signal);
    }
  };
}

function canConnect(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    socket.once("connect", () => {
      socket.destroy();
      resolve(true);
    });
    socket.once("error", () => {
      socket.destroy();
      resolve(false);
    });
  });
}

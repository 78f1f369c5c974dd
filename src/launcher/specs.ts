/**
 * Turns launcher configuration into supervisor launch specs.
 */
import path from "node:path";
import type { LiftoffConfig, ReadinessConfig, ServiceConfig } from "../config/index.js";
import { fixedDelay, tcpPort, type ReadinessProbe } from "../process/readiness.js";
import type { LaunchSpec } from "../process/supervisor.js";

export function toReadinessProbe(readiness: ReadinessConfig): ReadinessProbe {
  if ("delayMs" in readiness) {
    return fixedDelay(readiness.delayMs);
  }
  return tcpPort(readiness.tcp);
}

/** Each service runs as `<runtime> <script> [...args]` from the project dir. */
export function toLaunchSpec(
  config: LiftoffConfig,
  service: ServiceConfig,
  projectDir: string,
): LaunchSpec {
  return {
    name: service.name,
    label: service.label ?? service.name,
    command: config.runtime,
    args: [service.script, ...service.args],
    cwd: path.resolve(projectDir),
    readiness: service.readiness ? toReadinessProbe(service.readiness) : undefined,
  };
}

export function toLaunchSpecs(config: LiftoffConfig, projectDir: string): LaunchSpec[] {
  return config.services.map((service) => toLaunchSpec(config, service, projectDir));
}

/**
 * Configuration system for liftoff.
 *
 * Loads the optional liftoff.yaml from the project directory and resolves
 * the state directory (~/.liftoff/) used for log files. With no config file
 * the defaults launch tcp_proxy.py then tcp_simulator.py under python.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { LOG_LEVELS } from "../shared/types.js";

const STATE_DIRNAME = ".liftoff";
export const CONFIG_FILENAME = "liftoff.yaml";

export const DEFAULT_REQUIRED_FILES = [
  "tcp_proxy.py",
  "tcp_simulator.py",
  "simulator_config.yaml",
] as const;

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(`Invalid config ${configPath}: ${message}`);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const readinessSchema = z.union([
  z.object({ delayMs: z.number().int().nonnegative() }).strict(),
  z
    .object({
      tcp: z
        .object({
          host: z.string().min(1).optional(),
          port: z.number().int().min(1).max(65_535),
          timeoutMs: z.number().int().positive().optional(),
          intervalMs: z.number().int().positive().optional(),
        })
        .strict(),
    })
    .strict(),
]);

const serviceSchema = z
  .object({
    name: z.string().min(1),
    label: z.string().min(1).optional(),
    script: z.string().min(1),
    args: z.array(z.string()).default([]),
    readiness: readinessSchema.optional(),
  })
  .strict();

const configSchema = z
  .object({
    title: z.string().min(1).default("Rocket Flight Controller"),
    runtime: z.string().min(1).default("python"),
    startDelayMs: z.number().int().nonnegative().default(2000),
    requiredFiles: z.array(z.string().min(1)).default([...DEFAULT_REQUIRED_FILES]),
    services: z
      .array(serviceSchema)
      .min(1)
      .default([
        { name: "proxy", label: "TCP Proxy", script: "tcp_proxy.py" },
        { name: "simulator", label: "Rocket Simulator", script: "tcp_simulator.py" },
      ])
      .refine((services) => new Set(services.map((s) => s.name)).size === services.length, {
        message: "service names must be unique",
      }),
    visualizer: z.string().min(1).nullable().default("flight_visualizer.py"),
    shutdown: z
      .object({
        signal: z.enum(["SIGTERM", "SIGINT", "SIGHUP"]).default("SIGTERM"),
        killAfterMs: z.number().int().positive().optional(),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).default("info"),
        file: z.boolean().default(false),
      })
      .strict()
      .default({}),
  })
  .strict();

export type LiftoffConfig = z.infer<typeof configSchema>;
export type ServiceConfig = z.infer<typeof serviceSchema>;
export type ReadinessConfig = z.infer<typeof readinessSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LIFTOFF_HOME?.trim();
  if (override) {
    if (override.split(/[\\/]/).includes("..")) {
      throw new Error(
        `Invalid LIFTOFF_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!path.isAbsolute(override)) {
      throw new Error(`Invalid LIFTOFF_HOME path '${override}': path must be absolute`);
    }
    return path.resolve(override);
  }
  return os.homedir();
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LIFTOFF_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

export function resolveLogDir(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, "logs");
}

export function resolveConfigPath(projectDir: string, explicitPath?: string): string {
  return explicitPath
    ? path.resolve(projectDir, explicitPath)
    : path.join(projectDir, CONFIG_FILENAME);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Config file path, relative to the project directory. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate a parsed config document and apply defaults.
 *
 * @throws ConfigError naming the first invalid field.
 */
export function parseConfig(raw: unknown, source: string): LiftoffConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(source, `${where}${issue?.message ?? "invalid configuration"}`);
  }
  return result.data;
}

/**
 * Load liftoff.yaml (or `options.configPath`) from `projectDir`.
 *
 * A missing default config yields the built-in defaults; a missing
 * explicitly named config is an error. LIFTOFF_LOG_LEVEL overrides
 * logging.level.
 */
export function loadConfig(projectDir: string, options: LoadConfigOptions = {}): LiftoffConfig {
  const configPath = resolveConfigPath(projectDir, options.configPath);
  let raw: unknown = {};

  if (fs.existsSync(configPath)) {
    try {
      raw = parseYaml(fs.readFileSync(configPath, "utf-8"));
    } catch (error: unknown) {
      throw new ConfigError(configPath, error instanceof Error ? error.message : String(error));
    }
  } else if (options.configPath) {
    throw new ConfigError(configPath, "file not found");
  }

  const config = parseConfig(raw, configPath);
  return applyEnvOverrides(config, options.env ?? process.env, configPath);
}

function applyEnvOverrides(
  config: LiftoffConfig,
  env: NodeJS.ProcessEnv,
  source: string,
): LiftoffConfig {
  const level = env.LIFTOFF_LOG_LEVEL?.trim();
  if (!level) return config;

  const parsed = z.enum(LOG_LEVELS).safeParse(level);
  if (!parsed.success) {
    throw new ConfigError(source, `LIFTOFF_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  }
  return { ...config, logging: { ...config.logging, level: parsed.data } };
}

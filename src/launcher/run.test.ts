import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { FakeSignalSource, FakeSpawner } from "../../test/support/fakes.js";
import { parseConfig, type LiftoffConfig } from "../config/index.js";
import { Logger } from "../shared/logger.js";
import { EXIT_FAILURE, EXIT_OK, runLauncher, runPreflight } from "./run.js";

const RULE = "=".repeat(46);
const REQUIRED = ["tcp_proxy.py", "tcp_simulator.py", "simulator_config.yaml"];

let projectDir: string;
let log: MockInstance<typeof console.log>;
let warn: MockInstance<typeof console.warn>;
let error: MockInstance<typeof console.error>;

function lines(spy: { mock: { calls: unknown[][] } }): unknown[] {
  return spy.mock.calls.map((call) => call[0]);
}

function config(overrides: Record<string, unknown> = {}): LiftoffConfig {
  return parseConfig({ startDelayMs: 10, ...overrides }, "liftoff.yaml");
}

beforeEach(() => {
  projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "liftoff-run-test-"));
  for (const file of REQUIRED) {
    fs.writeFileSync(path.join(projectDir, file), "");
  }
  log = vi.spyOn(console, "log").mockImplementation(() => {});
  warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  error = vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(projectDir, { recursive: true, force: true });
});

describe("runLauncher", () => {
  it("starts both services, waits for Ctrl+C and stops them", async () => {
    const spawner = new FakeSpawner();
    const signals = new FakeSignalSource();
    const running = runLauncher({
      projectDir,
      config: config(),
      logger: new Logger({ service: "" }),
      spawn: spawner.spawn,
      signals,
    });

    await vi.waitFor(() => expect(lines(log)).toContain("[liftoff] Press Ctrl+C to stop all services"));
    signals.raise("SIGINT");

    await expect(running).resolves.toBe(EXIT_OK);
    expect(lines(log)).toEqual([
      "[liftoff] Starting Rocket Flight Controller Services",
      `[liftoff] ${RULE}`,
      "[liftoff] All required files found",
      "[liftoff] TCP Proxy started (PID: 4100)",
      "[liftoff] Rocket Simulator started (PID: 4101)",
      "[liftoff] All services are running:",
      "[liftoff]    - TCP Proxy PID: 4100",
      "[liftoff]    - Rocket Simulator PID: 4101",
      "[liftoff] To start the visualizer, run in another terminal:",
      "[liftoff]    python flight_visualizer.py",
      "[liftoff] Press Ctrl+C to stop all services",
      `[liftoff] ${RULE}`,
      "[liftoff] Received SIGINT",
      "[liftoff] Shutting down services...",
      "[liftoff] Services stopped",
    ]);
    expect(spawner.calls.map((c) => [c.command, ...c.args])).toEqual([
      ["python", "tcp_proxy.py"],
      ["python", "tcp_simulator.py"],
    ]);
    expect(spawner.calls[0]?.options).toMatchObject({ cwd: projectDir, stdio: "inherit" });
    expect(spawner.child(0).kills).toEqual(["SIGTERM"]);
    expect(spawner.child(1).kills).toEqual(["SIGTERM"]);
    expect(signals.listenerCount("SIGINT")).toBe(0);
  });

  it("exits 1 without spawning when a required file is missing", async () => {
    fs.rmSync(path.join(projectDir, "simulator_config.yaml"));
    fs.rmSync(path.join(projectDir, "tcp_proxy.py"));
    const spawner = new FakeSpawner();

    const code = await runLauncher({
      projectDir,
      config: config(),
      logger: new Logger({ service: "" }),
      spawn: spawner.spawn,
      signals: new FakeSignalSource(),
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(lines(error)).toEqual([
      "[liftoff] Error: tcp_proxy.py not found",
      "[liftoff] Error: simulator_config.yaml not found",
    ]);
    expect(spawner.calls).toHaveLength(0);
  });

  it("exits 1 and stops the proxy when the simulator fails to launch", async () => {
    const spawner = new FakeSpawner({ failing: ["tcp_simulator.py"] });

    const code = await runLauncher({
      projectDir,
      config: config(),
      logger: new Logger({ service: "" }),
      spawn: spawner.spawn,
      signals: new FakeSignalSource(),
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(lines(error)).toEqual([
      "[liftoff] Error: Failed to launch simulator: spawn python ENOENT",
    ]);
    expect(lines(warn)).toEqual(["[liftoff] Stopping 1 already launched process(es)"]);
    expect(spawner.child(0).kills).toEqual(["SIGTERM"]);
  });

  it("returns 0 when every service exits on its own", async () => {
    const spawner = new FakeSpawner();
    const running = runLauncher({
      projectDir,
      config: config(),
      logger: new Logger({ service: "" }),
      spawn: spawner.spawn,
      signals: new FakeSignalSource(),
    });

    await vi.waitFor(() => expect(lines(log)).toContain("[liftoff] Press Ctrl+C to stop all services"));
    spawner.child(0).exitWith(0);
    spawner.child(1).exitWith(3);

    await expect(running).resolves.toBe(EXIT_OK);
    expect(lines(log)).toContain("[liftoff] TCP Proxy exited");
    expect(lines(log).at(-1)).toBe("[liftoff] All services exited");
    expect(lines(warn)).toEqual(["[liftoff] simulator exited unexpectedly (code 3)"]);
  });

  it("leaves out the visualizer hint when none is configured", async () => {
    const spawner = new FakeSpawner();
    const signals = new FakeSignalSource();
    const running = runLauncher({
      projectDir,
      config: config({ visualizer: null, title: "Test Rig" }),
      logger: new Logger({ service: "" }),
      spawn: spawner.spawn,
      signals,
    });

    await vi.waitFor(() => expect(lines(log)).toContain("[liftoff] Press Ctrl+C to stop all services"));
    signals.raise("SIGTERM");
    await running;

    expect(lines(log)[0]).toBe("[liftoff] Starting Test Rig Services");
    expect(lines(log)).not.toContain("[liftoff] To start the visualizer, run in another terminal:");
  });

  it("forwards the configured shutdown signal", async () => {
    const spawner = new FakeSpawner();
    const signals = new FakeSignalSource();
    const running = runLauncher({
      projectDir,
      config: config({ shutdown: { signal: "SIGINT" } }),
      logger: new Logger({ service: "" }, { consoleOutput: false }),
      spawn: spawner.spawn,
      signals,
    });

    await vi.waitFor(() => expect(spawner.calls).toHaveLength(2));
    await vi.waitFor(() => expect(signals.listenerCount("SIGTERM")).toBe(1));
    signals.raise("SIGTERM");
    await running;

    expect(spawner.child(0).kills).toEqual(["SIGINT"]);
    expect(spawner.child(1).kills).toEqual(["SIGINT"]);
  });
});

describe("runPreflight", () => {
  it("returns 0 when every required file exists", () => {
    const code = runPreflight({ projectDir, config: config(), logger: new Logger({ service: "" }) });
    expect(code).toBe(EXIT_OK);
    expect(lines(log)).toEqual(["[liftoff] All required files found"]);
  });

  it("returns 1 and lists missing files", () => {
    fs.rmSync(path.join(projectDir, "tcp_simulator.py"));
    const code = runPreflight({ projectDir, config: config(), logger: new Logger({ service: "" }) });
    expect(code).toBe(EXIT_FAILURE);
    expect(lines(error)).toEqual(["[liftoff] Error: tcp_simulator.py not found"]);
  });
});

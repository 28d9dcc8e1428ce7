import { afterEach, describe, it, expect, vi } from "vitest";
import { loadBridgeConfig, resolveSimulatorBinary } from "../server/config";

describe("resolveSimulatorBinary", () => {
  it("prefers SUMO_BINARY, then SUMO_HOME, then the PATH", () => {
    expect(resolveSimulatorBinary({ SUMO_BINARY: "/usr/local/bin/sumo-gui", SUMO_HOME: "/opt/sumo" })).toBe(
      "/usr/local/bin/sumo-gui"
    );
    expect(resolveSimulatorBinary({ SUMO_HOME: "/opt/sumo" })).toBe("/opt/sumo/bin/sumo");
    expect(resolveSimulatorBinary({ SUMO_HOME: "  " })).toBe("sumo");
  });
});

describe("loadBridgeConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses defaults for an empty environment", () => {
    expect(loadBridgeConfig({}, "/work")).toEqual({
      binary: "sumo",
      host: "127.0.0.1",
      scenarioDir: "/work/scenarios",
      stepLength: 1,
      logFile: "sumo.log",
      connectRetries: 20,
      connectDelayMs: 250
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadBridgeConfig(
      {
        SUMO_SCENARIO_DIR: "/data/runs",
        SUMO_STEP_LENGTH: "0.1",
        SUMO_LOG_FILE: "debug.log",
        SUMO_CONNECT_RETRIES: "2.7",
        SUMO_CONNECT_DELAY_MS: "50"
      },
      "/work"
    );

    expect(config.scenarioDir).toBe("/data/runs");
    expect(config.stepLength).toBe(0.1);
    expect(config.logFile).toBe("debug.log");
    expect(config.connectRetries).toBe(2);
    expect(config.connectDelayMs).toBe(50);
  });

  it("resolves a relative scenario directory against the working directory", () => {
    expect(loadBridgeConfig({ SUMO_SCENARIO_DIR: "maps/city" }, "/work").scenarioDir).toBe("/work/maps/city");
  });

  it("warns and falls back on invalid numbers", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const config = loadBridgeConfig({ SUMO_STEP_LENGTH: "-1", SUMO_CONNECT_DELAY_MS: "soon" }, "/work");

    expect(config.stepLength).toBe(1);
    expect(config.connectDelayMs).toBe(250);
    expect(warn).toHaveBeenCalledWith("[sim-bridge] Ignoring invalid SUMO_STEP_LENGTH=-1; using 1.");
    expect(warn).toHaveBeenCalledWith("[sim-bridge] Ignoring invalid SUMO_CONNECT_DELAY_MS=soon; using 250.");
  });
});

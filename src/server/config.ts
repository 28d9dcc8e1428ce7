import { join, resolve } from "path";
import type { SimulatorLaunchConfig } from "../traci/launcher";

export interface BridgeConfig extends SimulatorLaunchConfig {
  /** Directory that launch requests and file downloads are resolved against. */
  scenarioDir: string;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_BRIDGE_CONFIG = {
  host: "127.0.0.1",
  scenarioDir: "scenarios",
  stepLength: 1.0,
  logFile: "sumo.log",
  connectRetries: 20,
  connectDelayMs: 250
} as const;

export function resolveSimulatorBinary(env: Env): string {
  const explicit = env.SUMO_BINARY?.trim();
  if (explicit) {
    return explicit;
  }
  const home = env.SUMO_HOME?.trim();
  if (home) {
    return join(home, "bin", "sumo");
  }
  return "sumo";
}

/** Reads the SUMO_* environment. Invalid numbers fall back to their defaults. */
export function loadBridgeConfig(env: Env = process.env, cwd: string = process.cwd()): BridgeConfig {
  return {
    binary: resolveSimulatorBinary(env),
    host: DEFAULT_BRIDGE_CONFIG.host,
    scenarioDir: resolve(cwd, env.SUMO_SCENARIO_DIR?.trim() || DEFAULT_BRIDGE_CONFIG.scenarioDir),
    stepLength: readPositiveNumber(env, "SUMO_STEP_LENGTH", DEFAULT_BRIDGE_CONFIG.stepLength),
    logFile: env.SUMO_LOG_FILE?.trim() || DEFAULT_BRIDGE_CONFIG.logFile,
    connectRetries: Math.max(
      1,
      Math.floor(readPositiveNumber(env, "SUMO_CONNECT_RETRIES", DEFAULT_BRIDGE_CONFIG.connectRetries))
    ),
    connectDelayMs: readPositiveNumber(
      env,
      "SUMO_CONNECT_DELAY_MS",
      DEFAULT_BRIDGE_CONFIG.connectDelayMs
    )
  };
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`[sim-bridge] Ignoring invalid ${name}=${raw}; using ${fallback}.`);
    return fallback;
  }
  return value;
}

import { ChildProcess, spawn } from "child_process";
import { createServer } from "net";
import { setTimeout as delay } from "timers/promises";
import { TraciClient } from "./client";
import { TraciSession } from "./session";

const STDERR_TAIL_CHARS = 2000;

export interface SimulatorLaunchConfig {
  binary: string;
  host: string;
  stepLength: number;
  logFile: string;
  connectRetries: number;
  connectDelayMs: number;
}

/** Absolute paths of the scenario to run. A config file wins over net/routes. */
export interface ResolvedScenario {
  configFile?: string;
  netFile?: string;
  routeFiles?: string[];
}

export interface LaunchDeps {
  spawnFn?: (command: string, args: string[]) => ChildProcess;
  connectFn?: (host: string, port: number) => Promise<TraciClient>;
  findPort?: () => Promise<number>;
}

export function buildSimulatorArgs(
  scenario: ResolvedScenario,
  port: number,
  config: Pick<SimulatorLaunchConfig, "stepLength" | "logFile">
): string[] {
  const args: string[] = [];
  if (scenario.configFile) {
    args.push("-c", scenario.configFile);
  } else if (scenario.netFile) {
    args.push("-n", scenario.netFile);
    if (scenario.routeFiles?.length) {
      args.push("-r", scenario.routeFiles.join(","));
    }
  } else {
    throw new Error("A configuration or network file is required to launch the simulator.");
  }
  args.push(
    "--remote-port",
    String(port),
    "--step-length",
    String(config.stepLength),
    "--no-step-log",
    "true",
    "--log",
    config.logFile,
    "--no-warnings",
    "true",
    "--ignore-route-errors",
    "true"
  );
  return args;
}

export function findFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : 0;
      server.close(() => {
        if (port) {
          resolve(port);
        } else {
          reject(new Error("Could not allocate a port for the simulator."));
        }
      });
    });
  });
}

/**
 * Starts the simulator as a TraCI server on a free port, connects once it
 * accepts connections, and performs the handshake. The returned session
 * kills the process when it is closed.
 */
export async function launchSimulator(
  scenario: ResolvedScenario,
  config: SimulatorLaunchConfig,
  deps: LaunchDeps = {}
): Promise<TraciSession> {
  const spawnFn =
    deps.spawnFn ??
    ((command: string, args: string[]) => spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] }));
  const connectFn = deps.connectFn ?? TraciClient.connect;
  const port = await (deps.findPort ?? findFreePort)();
  const args = buildSimulatorArgs(scenario, port, config);

  console.info(`[traci] Launching ${config.binary} ${args.join(" ")}`);
  const child = spawnFn(config.binary, args);
  const status: { stderrTail: string; exitError: Error | null } = { stderrTail: "", exitError: null };
  child.stderr?.on("data", (chunk: Buffer) => {
    status.stderrTail = (status.stderrTail + chunk.toString("utf-8")).slice(-STDERR_TAIL_CHARS);
  });
  child.once("error", (error: Error) => {
    status.exitError = new Error(`Failed to start simulator '${config.binary}': ${error.message}`);
  });
  child.once("exit", (code: number | null) => {
    const tail = status.stderrTail.trim();
    status.exitError ??= new Error(`Simulator exited with code ${code ?? "null"}.${tail ? ` ${tail}` : ""}`);
  });

  const killChild = () => {
    if (child.exitCode === null && !child.killed) {
      child.kill();
    }
  };

  let client: TraciClient | null = null;
  let lastError: unknown = null;
  for (let attempt = 0; attempt < config.connectRetries && !client; attempt += 1) {
    if (status.exitError) {
      throw status.exitError;
    }
    try {
      client = await connectFn(config.host, port);
    } catch (error) {
      lastError = error;
      await delay(config.connectDelayMs);
    }
  }
  if (!client) {
    killChild();
    const reason = lastError instanceof Error ? lastError.message : "no connection";
    throw new Error(`Could not connect to the simulator on port ${port}: ${reason}`);
  }

  const session = new TraciSession(client, { onClose: killChild });
  try {
    const version = await session.getVersion();
    console.info(`[traci] Connected to ${version.identifier} (API ${version.apiVersion}).`);
    await session.setOrder(1);
  } catch (error) {
    client.close();
    killChild();
    throw error;
  }
  return session;
}

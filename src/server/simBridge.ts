import { promises as fs } from "fs";
import { tmpdir } from "os";
import { isAbsolute, join, relative, resolve } from "path";
import type { Plugin } from "vite";
import type { LaunchRequest, SimulatorConnection } from "../sim/connection";
import {
  BridgeRequestError,
  RpcRequest,
  SIM_ROUTE_PREFIX,
  parseLaunchRequest,
  parseRpcRequest
} from "../sim/rpc";
import { errorMessage } from "../debug";
import { ResolvedScenario, launchSimulator } from "../traci/launcher";
import { BridgeConfig, loadBridgeConfig } from "./config";

const DEFAULT_ROUTES_XML = `<routes>
    <vType id="DEFAULT_VEHTYPE"/>
</routes>
`;

export type LaunchFn = (scenario: ResolvedScenario, config: BridgeConfig) => Promise<SimulatorConnection>;

export interface BridgeRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
}

export interface BridgeResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string | Uint8Array): unknown;
}

export interface LaunchResult {
  scenario: ResolvedScenario;
}

/** Resolves a client-supplied file name inside the scenario directory. */
export function resolveScenarioPath(scenarioDir: string, name: string): string {
  const root = resolve(scenarioDir);
  const target = resolve(root, name);
  const rel = relative(root, target);
  if (!rel || rel.startsWith("..") || isAbsolute(rel)) {
    throw new BridgeRequestError(`'${name}' is outside the scenario directory.`);
  }
  return target;
}

export async function dispatchRpc(
  connection: SimulatorConnection,
  request: Exclude<RpcRequest, { method: "close" }>
): Promise<unknown> {
  switch (request.method) {
    case "step":
      return connection.step();
    case "getVehicleIds":
      return connection.getVehicleIds();
    case "getSignalIds":
      return connection.getSignalIds();
    case "readVehicles":
      return connection.readVehicles(request.ids);
    case "readSignals":
      return connection.readSignals(request.ids);
    case "setSignalState":
      await connection.setSignalState(request.id, request.state);
      return null;
    case "setSignalPhase":
      await connection.setSignalPhase(request.id, request.phaseIndex);
      return null;
    case "setSignalProgram":
      await connection.setSignalProgram(request.id, request.programId);
      return null;
  }
}

/** Holds at most one simulator session on behalf of the browser. */
export class SimulatorBridge {
  private readonly config: BridgeConfig;
  private readonly launchFn: LaunchFn;
  private connection: SimulatorConnection | null = null;
  private tempDir: string | null = null;

  constructor(config: BridgeConfig, launchFn: LaunchFn = launchSimulator) {
    this.config = config;
    this.launchFn = launchFn;
  }

  hasSession(): boolean {
    return this.connection !== null;
  }

  async launch(request: LaunchRequest): Promise<LaunchResult> {
    await this.close();
    const scenario = await this.resolveScenario(request);
    try {
      this.connection = await this.launchFn(scenario, this.config);
    } catch (error) {
      await this.removeTempDir();
      throw error;
    }
    console.info("[sim-bridge] Simulator session opened.");
    return { scenario };
  }

  async call(request: RpcRequest): Promise<unknown> {
    if (request.method === "close") {
      await this.close();
      return null;
    }
    const connection = this.connection;
    if (!connection) {
      throw new BridgeRequestError("No simulator session is open.");
    }
    return dispatchRpc(connection, request);
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    try {
      if (connection) {
        await connection.close();
        console.info("[sim-bridge] Simulator session closed.");
      }
    } finally {
      await this.removeTempDir();
    }
  }

  readScenarioFile(name: string): Promise<Buffer> {
    return fs.readFile(resolveScenarioPath(this.config.scenarioDir, name));
  }

  private async resolveScenario(request: LaunchRequest): Promise<ResolvedScenario> {
    const dir = this.config.scenarioDir;
    if (request.configFile) {
      return { configFile: resolveScenarioPath(dir, request.configFile) };
    }
    if (!request.netFile) {
      throw new BridgeRequestError("Either 'configFile' or 'netFile' is required.");
    }
    const netFile = resolveScenarioPath(dir, request.netFile);
    const routeFiles = (request.routeFiles ?? []).map((name) => resolveScenarioPath(dir, name));
    if (!routeFiles.length) {
      routeFiles.push(await this.writeDefaultRoutes());
    }
    return { netFile, routeFiles };
  }

  /** A route file declaring only the default vehicle type, for network-only launches. */
  private async writeDefaultRoutes(): Promise<string> {
    this.tempDir = await fs.mkdtemp(join(tmpdir(), "sim-bridge-"));
    const path = join(this.tempDir, "default.rou.xml");
    await fs.writeFile(path, DEFAULT_ROUTES_XML, "utf-8");
    return path;
  }

  private async removeTempDir(): Promise<void> {
    const dir = this.tempDir;
    this.tempDir = null;
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

async function readJsonBody(req: BridgeRequest): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  const text = Buffer.concat(chunks).toString("utf-8");
  if (!text.trim()) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new BridgeRequestError("Request body is not valid JSON.");
  }
}

function sendJson(res: BridgeResponse, statusCode: number, payload: unknown) {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Serves `/__sim/*`. Returns false for other URLs so the caller can pass the
 * request on.
 */
export async function handleSimRequest(
  bridge: SimulatorBridge,
  req: BridgeRequest,
  res: BridgeResponse
): Promise<boolean> {
  const url = req.url ?? "";
  if (!url.startsWith(`${SIM_ROUTE_PREFIX}/`)) {
    return false;
  }
  const path = url.slice(SIM_ROUTE_PREFIX.length).split("?")[0];
  try {
    if (req.method === "GET" && path.startsWith("/files/")) {
      const name = decodeURIComponent(path.slice("/files/".length));
      const bytes = await bridge.readScenarioFile(name);
      res.statusCode = 200;
      res.setHeader("Content-Type", "application/octet-stream");
      res.end(bytes);
      return true;
    }
    if (req.method !== "POST") {
      sendJson(res, 405, { error: `${req.method ?? "?"} not allowed on ${path}.` });
      return true;
    }
    if (path === "/launch") {
      const request = parseLaunchRequest(await readJsonBody(req));
      const result = await bridge.launch(request);
      sendJson(res, 200, { result });
      return true;
    }
    if (path === "/rpc") {
      const request = parseRpcRequest(await readJsonBody(req));
      const result = await bridge.call(request);
      sendJson(res, 200, { result });
      return true;
    }
    sendJson(res, 404, { error: `Unknown simulator route ${path}.` });
  } catch (error) {
    if (error instanceof BridgeRequestError) {
      sendJson(res, 400, { error: error.message });
    } else if (isMissingFile(error)) {
      sendJson(res, 404, { error: "Scenario file not found." });
    } else {
      console.error(`[sim-bridge] ${path} failed`, error);
      sendJson(res, 500, { error: errorMessage(error) });
    }
  }
  return true;
}

export interface SimulatorBridgeOptions {
  config?: BridgeConfig;
}

/** Dev-server plugin that exposes one simulator session to the browser. */
export function simulatorBridge(options: SimulatorBridgeOptions = {}): Plugin {
  return {
    name: "simulator-bridge",
    configureServer(server) {
      const config = options.config ?? loadBridgeConfig();
      const bridge = new SimulatorBridge(config);
      console.info(`[sim-bridge] Using ${config.binary}, scenarios from ${config.scenarioDir}`);
      server.middlewares.use((req, res, next) => {
        handleSimRequest(bridge, req, res)
          .then((handled) => {
            if (!handled) {
              next();
            }
          })
          .catch(next);
      });
      server.httpServer?.once("close", () => {
        bridge.close().catch((error: unknown) => {
          console.warn("[sim-bridge] Error closing simulator session", error);
        });
      });
    }
  };
}

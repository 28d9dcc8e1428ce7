import type {
  EntityReading,
  LaunchRequest,
  SignalSample,
  SimulatorConnection,
  VehicleSample
} from "./connection";
import { RpcRequest, SIM_ROUTE_PREFIX } from "./rpc";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export class BridgeError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "BridgeError";
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isVehicleSample(value: unknown): value is VehicleSample {
  return (
    isRecord(value) &&
    typeof value.type === "string" &&
    typeof value.x === "number" &&
    typeof value.y === "number" &&
    typeof value.speed === "number" &&
    typeof value.roadId === "string" &&
    typeof value.laneId === "string" &&
    typeof value.lanePosition === "number"
  );
}

function isSignalSample(value: unknown): value is SignalSample {
  return (
    isRecord(value) &&
    typeof value.state === "string" &&
    typeof value.program === "string" &&
    typeof value.phase === "number"
  );
}

function parseReadings<T>(
  value: unknown,
  isSample: (sample: unknown) => sample is T,
  context: string
): Array<EntityReading<T>> {
  if (!Array.isArray(value)) {
    throw new BridgeError(`${context}: expected a list of readings.`, 0);
  }
  return value.map((item): EntityReading<T> => {
    if (!isRecord(item) || typeof item.id !== "string") {
      throw new BridgeError(`${context}: malformed reading.`, 0);
    }
    if (item.ok === true && isSample(item.value)) {
      return { id: item.id, ok: true, value: item.value };
    }
    if (item.ok === false && typeof item.error === "string") {
      return { id: item.id, ok: false, error: item.error };
    }
    throw new BridgeError(`${context}: malformed reading for ${item.id}.`, 0);
  });
}

/**
 * Simulator handle in the browser. Every call is forwarded as JSON to the
 * dev-server bridge, which holds the actual TraCI session.
 */
export class BridgeConnection implements SimulatorConnection {
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;

  constructor(fetchFn: FetchFn = (input, init) => fetch(input, init), baseUrl = SIM_ROUTE_PREFIX) {
    this.fetchFn = fetchFn;
    this.baseUrl = baseUrl;
  }

  /** Asks the bridge to start a simulator for the scenario and returns a handle on it. */
  static async launch(request: LaunchRequest, fetchFn?: FetchFn): Promise<BridgeConnection> {
    const connection = new BridgeConnection(fetchFn);
    await connection.post("/launch", request);
    return connection;
  }

  async step(): Promise<number> {
    const result = await this.call({ method: "step" });
    if (typeof result !== "number") {
      throw new BridgeError("step: expected the simulation time.", 0);
    }
    return result;
  }

  async getVehicleIds(): Promise<string[]> {
    return this.callForIds({ method: "getVehicleIds" });
  }

  async getSignalIds(): Promise<string[]> {
    return this.callForIds({ method: "getSignalIds" });
  }

  async readVehicles(ids: readonly string[]): Promise<Array<EntityReading<VehicleSample>>> {
    const result = await this.call({ method: "readVehicles", ids: [...ids] });
    return parseReadings(result, isVehicleSample, "readVehicles");
  }

  async readSignals(ids: readonly string[]): Promise<Array<EntityReading<SignalSample>>> {
    const result = await this.call({ method: "readSignals", ids: [...ids] });
    return parseReadings(result, isSignalSample, "readSignals");
  }

  async setSignalState(id: string, state: string): Promise<void> {
    await this.call({ method: "setSignalState", id, state });
  }

  async setSignalPhase(id: string, phaseIndex: number): Promise<void> {
    await this.call({ method: "setSignalPhase", id, phaseIndex });
  }

  async setSignalProgram(id: string, programId: string): Promise<void> {
    await this.call({ method: "setSignalProgram", id, programId });
  }

  async close(): Promise<void> {
    await this.call({ method: "close" });
  }

  private async callForIds(request: RpcRequest): Promise<string[]> {
    const result = await this.call(request);
    if (!isStringList(result)) {
      throw new BridgeError(`${request.method}: expected a list of ids.`, 0);
    }
    return result;
  }

  private call(request: RpcRequest): Promise<unknown> {
    return this.post("/rpc", request);
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body)
      });
    } catch {
      throw new BridgeError("Simulator bridge unavailable. Is the dev server running?", 0);
    }
    const payload: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const message =
        isRecord(payload) && typeof payload.error === "string"
          ? payload.error
          : `Simulator bridge returned ${response.status}`;
      throw new BridgeError(message, response.status);
    }
    return isRecord(payload) ? payload.result : undefined;
  }
}

/** Downloads a file from the bridge's scenario directory. */
export async function fetchScenarioFile(
  name: string,
  fetchFn: FetchFn = (input, init) => fetch(input, init)
): Promise<Uint8Array> {
  const response = await fetchFn(`${SIM_ROUTE_PREFIX}/files/${encodeURIComponent(name)}`);
  if (!response.ok) {
    throw new BridgeError(`Could not fetch scenario file '${name}' (${response.status}).`, response.status);
  }
  return new Uint8Array(await response.arrayBuffer());
}

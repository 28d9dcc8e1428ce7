import type { LaunchRequest } from "./connection";

/** Calls the browser makes against the session held by the dev server. */
export type RpcRequest =
  | { method: "step" }
  | { method: "getVehicleIds" }
  | { method: "getSignalIds" }
  | { method: "readVehicles"; ids: string[] }
  | { method: "readSignals"; ids: string[] }
  | { method: "setSignalState"; id: string; state: string }
  | { method: "setSignalPhase"; id: string; phaseIndex: number }
  | { method: "setSignalProgram"; id: string; programId: string }
  | { method: "close" };

export const SIM_ROUTE_PREFIX = "/__sim";

export class BridgeRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BridgeRequestError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== "string" || !value) {
    throw new BridgeRequestError(`'${key}' must be a non-empty string.`);
  }
  return value;
}

function requireStringList(body: Record<string, unknown>, key: string): string[] {
  const value = body[key];
  if (!Array.isArray(value)) {
    throw new BridgeRequestError(`'${key}' must be an array of strings.`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      throw new BridgeRequestError(`'${key}' must be an array of strings.`);
    }
    items.push(item);
  }
  return items;
}

export function parseRpcRequest(body: unknown): RpcRequest {
  if (!isRecord(body)) {
    throw new BridgeRequestError("Request body must be a JSON object.");
  }
  const method = body.method;
  switch (method) {
    case "step":
    case "getVehicleIds":
    case "getSignalIds":
    case "close":
      return { method };
    case "readVehicles":
    case "readSignals":
      return { method, ids: requireStringList(body, "ids") };
    case "setSignalState": {
      const state = body.state;
      if (typeof state !== "string") {
        throw new BridgeRequestError("'state' must be a string.");
      }
      return { method, id: requireString(body, "id"), state };
    }
    case "setSignalPhase": {
      const phaseIndex = body.phaseIndex;
      if (typeof phaseIndex !== "number" || !Number.isInteger(phaseIndex) || phaseIndex < 0) {
        throw new BridgeRequestError("'phaseIndex' must be a non-negative integer.");
      }
      return { method, id: requireString(body, "id"), phaseIndex };
    }
    case "setSignalProgram":
      return { method, id: requireString(body, "id"), programId: requireString(body, "programId") };
    default:
      throw new BridgeRequestError(`Unknown method '${String(method)}'.`);
  }
}

export function parseLaunchRequest(body: unknown): LaunchRequest {
  if (!isRecord(body)) {
    throw new BridgeRequestError("Request body must be a JSON object.");
  }
  const request: LaunchRequest = {};
  if (body.configFile !== undefined) {
    request.configFile = requireString(body, "configFile");
  }
  if (body.netFile !== undefined) {
    request.netFile = requireString(body, "netFile");
  }
  if (body.routeFiles !== undefined) {
    request.routeFiles = requireStringList(body, "routeFiles").filter((name) => name.trim());
  }
  if (!request.configFile && !request.netFile) {
    throw new BridgeRequestError("Either 'configFile' or 'netFile' is required.");
  }
  return request;
}

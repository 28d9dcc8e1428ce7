import { decodeNetworkFile, parseNetwork } from "../network/netParser";
import { parseSumoConfig } from "../network/scenarioFiles";
import type { Topology } from "../network/types";
import type { LaunchRequest } from "../sim/connection";

/** Scenario file names, relative to the bridge's scenario directory. */
export interface ScenarioSelection {
  configFile: string | null;
  netFile: string | null;
  routeFiles: string[];
}

export interface LoadedScenario {
  topology: Topology;
  selection: ScenarioSelection;
  label: string;
}

export function configDirectory(name: string): string {
  const slash = name.lastIndexOf("/");
  return slash >= 0 ? name.slice(0, slash + 1) : "";
}

export function loadNetwork(name: string, bytes: Uint8Array, routeFiles: string[]): LoadedScenario {
  const topology = parseNetwork(decodeNetworkFile(bytes));
  return { topology, selection: { configFile: null, netFile: name, routeFiles }, label: name };
}

/** Reads a `.sumocfg` and fetches the network it names, relative to the config. */
export async function loadConfiguration(
  name: string,
  text: string,
  fetchFile: (name: string) => Promise<Uint8Array>
): Promise<LoadedScenario> {
  const config = parseSumoConfig(text);
  if (!config.netFile) {
    throw new Error("Configuration names no net-file.");
  }
  const netName = `${configDirectory(name)}${config.netFile}`;
  const topology = parseNetwork(decodeNetworkFile(await fetchFile(netName)));
  return {
    topology,
    selection: { configFile: name, netFile: netName, routeFiles: config.routeFiles },
    label: netName
  };
}

/**
 * Loads the next scenario and stops the running session only once it parsed,
 * so a broken file leaves the current simulation alone.
 */
export async function reloadScenario(
  load: () => LoadedScenario | Promise<LoadedScenario>,
  stop: () => Promise<void>
): Promise<LoadedScenario> {
  const next = await load();
  await stop();
  return next;
}

export function buildLaunchRequest(selection: ScenarioSelection): LaunchRequest {
  if (selection.configFile) {
    return { configFile: selection.configFile };
  }
  if (!selection.netFile) {
    throw new Error("Load a network or configuration file first.");
  }
  return { netFile: selection.netFile, routeFiles: selection.routeFiles };
}

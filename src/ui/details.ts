import type { EndpointClassification } from "../network/endpoints";
import type { SimulatorConnection } from "../sim/connection";
import type { LoopStats } from "../sim/simulationLoop";
import { SignalState, dominantLamp } from "../sim/signalStore";
import { VehicleState, vehicleAliveSeconds } from "../sim/vehicleStore";

export const DETAILS_PLACEHOLDER = "Click on a vehicle or traffic light to see details.";

const MS_TO_KMH = 3.6;

export function formatVehicleDetails(vehicle: VehicleState, speed: number, now: number): string {
  return [
    "Vehicle Information",
    `ID: ${vehicle.id}`,
    `Type: ${vehicle.type}`,
    `Position: (${vehicle.x.toFixed(2)}, ${vehicle.y.toFixed(2)})`,
    `Speed: ${speed.toFixed(2)} m/s (${(speed * MS_TO_KMH).toFixed(1)} km/h)`,
    `Angle: ${vehicle.angle.toFixed(1)}°`,
    `Current Edge: ${vehicle.roadId || "N/A"}`,
    `Current Lane: ${vehicle.laneId || "N/A"}`,
    `Lane Position: ${vehicle.lanePosition.toFixed(2)} m`,
    `Alive Time: ${vehicleAliveSeconds(vehicle, now).toFixed(1)} s`
  ].join("\n");
}

export function formatVehicleError(id: string): string {
  return `ID: ${id}\nError fetching details`;
}

/** Fetches the live speed of one vehicle and renders its details. */
export async function describeVehicle(
  connection: SimulatorConnection,
  vehicle: VehicleState,
  now: number
): Promise<string> {
  try {
    const [reading] = await connection.readVehicles([vehicle.id]);
    if (!reading || !reading.ok) {
      return formatVehicleError(vehicle.id);
    }
    return formatVehicleDetails(vehicle, reading.value.speed, now);
  } catch (error) {
    console.warn(`[details] Could not fetch vehicle ${vehicle.id}`, error);
    return formatVehicleError(vehicle.id);
  }
}

export function formatSignalDetails(signal: SignalState): string {
  return [
    "Traffic Light",
    `ID: ${signal.id}`,
    `State: ${signal.state || "N/A"}`,
    `Lamp: ${dominantLamp(signal.state)}`,
    `Program: ${signal.program || "N/A"}`,
    `Phase: ${signal.phase}`
  ].join("\n");
}

export function formatStats(stats: LoopStats, endpoints: EndpointClassification | null): string {
  const lines = [
    "Statistics",
    `Current: ${stats.vehicles} vehicles`,
    `Spawned: ${stats.spawned} total`,
    `Arrived: ${stats.arrived} total`,
    `Traffic Lights: ${stats.signals}`
  ];
  if (endpoints) {
    lines.push(`Entry Edges: ${endpoints.entryEdges.length}`, `Exit Edges: ${endpoints.exitEdges.length}`);
  }
  return lines.join("\n");
}

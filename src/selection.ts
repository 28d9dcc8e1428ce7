import type { ViewerSettings } from "./config";
import type { SignalState, SignalStore } from "./sim/signalStore";
import type { VehicleState, VehicleStore } from "./sim/vehicleStore";

export type Selection = { kind: "signal"; id: string } | { kind: "vehicle"; id: string };

export function findNearestVehicle(
  vehicles: Iterable<VehicleState>,
  x: number,
  y: number,
  tolerance: number
): VehicleState | null {
  let best: VehicleState | null = null;
  let bestDist = Infinity;
  for (const vehicle of vehicles) {
    const dist = Math.hypot(vehicle.x - x, vehicle.y - y);
    if (dist < tolerance && dist < bestDist) {
      best = vehicle;
      bestDist = dist;
    }
  }
  return best;
}

/**
 * Resolves a click in world coordinates. Signals win over vehicles; the
 * vehicle radius is a fixed number of screen pixels.
 */
export function pickAt(
  worldX: number,
  worldY: number,
  zoom: number,
  signals: Pick<SignalStore, "findNearest">,
  vehicles: Pick<VehicleStore, "values">,
  settings: Pick<ViewerSettings, "signalPickTolerance" | "vehiclePickPixels">
): Selection | null {
  const signal: SignalState | null = signals.findNearest(worldX, worldY, settings.signalPickTolerance);
  if (signal) {
    return { kind: "signal", id: signal.id };
  }
  const vehicle = findNearestVehicle(vehicles.values(), worldX, worldY, settings.vehiclePickPixels / zoom);
  return vehicle ? { kind: "vehicle", id: vehicle.id } : null;
}

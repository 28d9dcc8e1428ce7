export interface ViewerSettings {
  tickIntervalMs: number;
  /** World-unit radius for picking a signal. */
  signalPickTolerance: number;
  /** Screen-pixel radius for picking a vehicle; divided by zoom. */
  vehiclePickPixels: number;
  zoomInFactor: number;
  wheelZoomInFactor: number;
  wheelZoomOutFactor: number;
  spawnIntervalMin: number;
  spawnIntervalMax: number;
  spawnIntervalDefault: number;
  /** Vehicle images by type, drawn instead of rectangles once loaded. */
  vehicleImages: Record<string, string>;
}

export const DEFAULT_VIEWER_SETTINGS: ViewerSettings = {
  tickIntervalMs: 100,
  signalPickTolerance: 15,
  vehiclePickPixels: 10,
  zoomInFactor: 1.2,
  wheelZoomInFactor: 1.1,
  wheelZoomOutFactor: 0.9,
  spawnIntervalMin: 1,
  spawnIntervalMax: 10,
  spawnIntervalDefault: 2,
  vehicleImages: {
    car: "vehicles/car.svg",
    bus: "vehicles/bus.svg",
    truck: "vehicles/truck.svg",
    motorcycle: "vehicles/motorcycle.svg",
    bike: "vehicles/bike.svg"
  }
};

export function clampSpawnInterval(value: number, settings: ViewerSettings = DEFAULT_VIEWER_SETTINGS): number {
  if (!Number.isFinite(value)) {
    return settings.spawnIntervalDefault;
  }
  return Math.min(settings.spawnIntervalMax, Math.max(settings.spawnIntervalMin, Math.round(value)));
}

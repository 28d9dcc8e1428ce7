import { EntityReading, SimulatorConnection, VehicleSample } from "./connection";

/** Per-axis movement (meters) below which the heading is held. */
export const HEADING_EPSILON_M = 0.01;
export const DEFAULT_VEHICLE_TYPE = "car";

export const VEHICLE_PALETTE: readonly string[] = [
  "rgb(220, 20, 20)",
  "rgb(20, 100, 220)",
  "rgb(20, 180, 20)",
  "rgb(200, 180, 20)",
  "rgb(150, 50, 200)",
  "rgb(255, 140, 0)",
  "rgb(100, 100, 100)",
  "rgb(0, 150, 150)"
];

export interface VehicleState {
  id: string;
  type: string;
  x: number;
  y: number;
  speed: number;
  /** Degrees, counter-clockwise from +X in world space. */
  angle: number;
  roadId: string | null;
  laneId: string | null;
  lanePosition: number;
  spawnedAt: number;
  color: string;
}

export interface VehicleSyncResult {
  active: number;
  added: string[];
  removed: string[];
  failed: string[];
}

export interface VehicleStoreOptions {
  clock?: () => number;
  random?: () => number;
}

export function createVehicleState(
  id: string,
  x: number,
  y: number,
  spawnedAt: number,
  color: string
): VehicleState {
  return {
    id,
    type: DEFAULT_VEHICLE_TYPE,
    x,
    y,
    speed: 0,
    angle: 0,
    roadId: null,
    laneId: null,
    lanePosition: 0,
    spawnedAt,
    color
  };
}

/** Moves the vehicle and re-derives its heading from the displacement. */
export function updateVehiclePosition(vehicle: VehicleState, x: number, y: number): void {
  const dx = x - vehicle.x;
  const dy = y - vehicle.y;
  if (Math.abs(dx) > HEADING_EPSILON_M || Math.abs(dy) > HEADING_EPSILON_M) {
    vehicle.angle = (Math.atan2(dy, dx) * 180) / Math.PI;
  }
  vehicle.x = x;
  vehicle.y = y;
}

export function applyVehicleSample(vehicle: VehicleState, sample: VehicleSample): void {
  updateVehiclePosition(vehicle, sample.x, sample.y);
  vehicle.speed = sample.speed;
  vehicle.type = sample.type || vehicle.type;
  vehicle.roadId = sample.roadId;
  vehicle.laneId = sample.laneId;
  vehicle.lanePosition = sample.lanePosition;
}

export function vehicleAliveSeconds(vehicle: VehicleState, now: number): number {
  return Math.max(0, now - vehicle.spawnedAt) / 1000;
}

export class VehicleStore {
  private readonly vehicles = new Map<string, VehicleState>();
  private readonly clock: () => number;
  private readonly random: () => number;
  private spawnedTotal = 0;
  private removedTotal = 0;

  constructor(options: VehicleStoreOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
    this.random = options.random ?? Math.random;
  }

  get size(): number {
    return this.vehicles.size;
  }

  get(id: string): VehicleState | undefined {
    return this.vehicles.get(id);
  }

  ids(): string[] {
    return Array.from(this.vehicles.keys());
  }

  values(): VehicleState[] {
    return Array.from(this.vehicles.values());
  }

  getSpawnedTotal(): number {
    return this.spawnedTotal;
  }

  getRemovedTotal(): number {
    return this.removedTotal;
  }

  clear(): void {
    this.vehicles.clear();
    this.spawnedTotal = 0;
    this.removedTotal = 0;
  }

  /**
   * Brings the store in line with the simulator: drops every id the simulator
   * no longer reports, then reads and upserts the remaining ones. A failed
   * read keeps a known vehicle at its last values and skips an unknown one.
   * Nothing is written when `isCurrent` turns false while the reads are out.
   */
  async sync(
    connection: SimulatorConnection,
    isCurrent: () => boolean = () => true
  ): Promise<VehicleSyncResult | null> {
    const activeIds = await connection.getVehicleIds();
    const readings = activeIds.length ? await connection.readVehicles(activeIds) : [];
    if (!isCurrent()) {
      return null;
    }
    return this.apply(activeIds, readings);
  }

  apply(
    activeIds: readonly string[],
    readings: ReadonlyArray<EntityReading<VehicleSample>>
  ): VehicleSyncResult {
    const active = new Set(activeIds);
    const removed: string[] = [];
    for (const id of this.vehicles.keys()) {
      if (!active.has(id)) {
        removed.push(id);
      }
    }
    for (const id of removed) {
      this.vehicles.delete(id);
    }
    this.removedTotal += removed.length;

    const added: string[] = [];
    const failed: string[] = [];
    for (const reading of readings) {
      if (!active.has(reading.id)) {
        continue;
      }
      if (!reading.ok) {
        failed.push(reading.id);
        continue;
      }
      let vehicle = this.vehicles.get(reading.id);
      if (!vehicle) {
        vehicle = createVehicleState(
          reading.id,
          reading.value.x,
          reading.value.y,
          this.clock(),
          this.pickColor()
        );
        this.vehicles.set(reading.id, vehicle);
        this.spawnedTotal += 1;
        added.push(reading.id);
      }
      applyVehicleSample(vehicle, reading.value);
    }

    return { active: this.vehicles.size, added, removed, failed };
  }

  private pickColor(): string {
    const idx = Math.floor(this.random() * VEHICLE_PALETTE.length);
    return VEHICLE_PALETTE[Math.min(VEHICLE_PALETTE.length - 1, Math.max(0, idx))];
  }
}

import { Topology } from "../network/types";
import { SimulatorConnection } from "./connection";

export type SignalLamp = "green" | "yellow" | "red" | "off";

export interface SignalState {
  id: string;
  x: number;
  y: number;
  state: string;
  program: string;
  phase: number;
}

export interface SignalInitResult {
  reported: number;
  matched: number;
  dropped: string[];
}

/**
 * Collapses a per-link state string ("GrGr", "yyrr", ...) to one lamp colour
 * for the map marker: any green wins, then yellow, then red.
 */
export function dominantLamp(state: string): SignalLamp {
  if (/[Gg]/.test(state)) {
    return "green";
  }
  if (/[Yy]/.test(state)) {
    return "yellow";
  }
  if (/[RrUu]/.test(state)) {
    return "red";
  }
  return "off";
}

export class SignalStore {
  private readonly signals = new Map<string, SignalState>();

  get size(): number {
    return this.signals.size;
  }

  get(id: string): SignalState | undefined {
    return this.signals.get(id);
  }

  values(): SignalState[] {
    return Array.from(this.signals.values());
  }

  clear(): void {
    this.signals.clear();
  }

  /**
   * Registers every simulator signal whose id names a junction of the
   * topology. Signals without a matching junction have no map position and
   * are dropped.
   */
  async initialize(connection: SimulatorConnection, topology: Topology): Promise<SignalInitResult> {
    this.signals.clear();
    const ids = await connection.getSignalIds();
    const dropped: string[] = [];
    for (const id of ids) {
      const junction = topology.junctionById.get(id);
      if (!junction) {
        dropped.push(id);
        continue;
      }
      this.signals.set(id, { id, x: junction.x, y: junction.y, state: "", program: "", phase: 0 });
    }
    if (dropped.length) {
      console.warn(`[signals] ${dropped.length} signal(s) without a matching junction dropped.`);
    }
    await this.refresh(connection);
    return { reported: ids.length, matched: this.signals.size, dropped };
  }

  /** Reads the live state of every known signal. Returns the ids that failed. */
  async refresh(
    connection: SimulatorConnection,
    isCurrent: () => boolean = () => true
  ): Promise<string[]> {
    if (!this.signals.size) {
      return [];
    }
    const readings = await connection.readSignals(Array.from(this.signals.keys()));
    if (!isCurrent()) {
      return [];
    }
    const failed: string[] = [];
    for (const reading of readings) {
      const signal = this.signals.get(reading.id);
      if (!signal) {
        continue;
      }
      if (!reading.ok) {
        failed.push(reading.id);
        continue;
      }
      signal.state = reading.value.state;
      signal.program = reading.value.program;
      signal.phase = reading.value.phase;
    }
    return failed;
  }

  findNearest(x: number, y: number, tolerance: number): SignalState | null {
    let best: SignalState | null = null;
    let bestDist = Infinity;
    for (const signal of this.signals.values()) {
      const dist = Math.hypot(signal.x - x, signal.y - y);
      if (dist <= tolerance && dist < bestDist) {
        best = signal;
        bestDist = dist;
      }
    }
    return best;
  }
}

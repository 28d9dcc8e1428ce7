import { Topology } from "../network/types";
import { createDebugLog, errorMessage } from "../debug";
import { ConnectFn, SimulatorConnection } from "./connection";
import { SignalStore } from "./signalStore";
import { SimulationTimer } from "./simulationTimer";
import { VehicleStore } from "./vehicleStore";

type TimeoutHandle = ReturnType<typeof setTimeout>;

export type LoopState = "idle" | "running";

export const DEFAULT_TICK_INTERVAL_MS = 100;

export interface LoopStats {
  vehicles: number;
  spawned: number;
  arrived: number;
  signals: number;
}

export interface LoopFrame {
  simTime: number;
  elapsed: string;
  stats: LoopStats;
}

export interface SimulationLoopOptions {
  connect: ConnectFn;
  getTopology: () => Topology | null;
  vehicles: VehicleStore;
  signals: SignalStore;
  tickIntervalMs?: number;
  timer?: SimulationTimer;
  clock?: () => number;
  setTimeoutFn?: typeof setTimeout;
  clearTimeoutFn?: typeof clearTimeout;
  onFrame?: (frame: LoopFrame) => void;
  onStatus?: (message: string) => void;
  onStateChange?: (state: LoopState) => void;
}

const debugLog = createDebugLog("sim-loop");

/**
 * Drives the external simulator: one step, a vehicle resync and a signal
 * resync per tick, then a frame notification. Ticks are chained through
 * `setTimeout`, so two ticks never overlap. Every tick belongs to a run
 * generation; stopping bumps the generation and a tick that comes back from
 * an await into an older generation leaves the stores untouched.
 */
export class SimulationLoop {
  private readonly connectFn: ConnectFn;
  private readonly getTopology: () => Topology | null;
  private readonly vehicles: VehicleStore;
  private readonly signals: SignalStore;
  private readonly tickIntervalMs: number;
  private readonly timer: SimulationTimer;
  private readonly clock: () => number;
  private readonly setTimeoutFn: typeof setTimeout;
  private readonly clearTimeoutFn: typeof clearTimeout;
  private readonly onFrame: (frame: LoopFrame) => void;
  private readonly onStatus: (message: string) => void;
  private readonly onStateChange: (state: LoopState) => void;

  private state: LoopState = "idle";
  private connection: SimulatorConnection | null = null;
  private opening: Promise<SimulatorConnection | null> | null = null;
  private generation = 0;
  private timerHandle: TimeoutHandle | null = null;
  private inFlight: Promise<void> | null = null;
  private simTime = 0;

  constructor(options: SimulationLoopOptions) {
    this.connectFn = options.connect;
    this.getTopology = options.getTopology;
    this.vehicles = options.vehicles;
    this.signals = options.signals;
    this.tickIntervalMs = Math.max(1, options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS);
    this.clock = options.clock ?? (() => Date.now());
    this.timer = options.timer ?? new SimulationTimer(this.clock);
    this.setTimeoutFn = options.setTimeoutFn ?? setTimeout;
    this.clearTimeoutFn = options.clearTimeoutFn ?? clearTimeout;
    this.onFrame = options.onFrame ?? (() => {});
    this.onStatus = options.onStatus ?? (() => {});
    this.onStateChange = options.onStateChange ?? (() => {});
  }

  getState(): LoopState {
    return this.state;
  }

  isConnected(): boolean {
    return this.connection !== null;
  }

  /** The open session, for detail queries and signal control from the UI. */
  getConnection(): SimulatorConnection | null {
    return this.connection;
  }

  getSimulationTime(): number {
    return this.simTime;
  }

  getElapsed(): string {
    return this.timer.getFormattedTime();
  }

  getStats(): LoopStats {
    return {
      vehicles: this.vehicles.size,
      spawned: this.vehicles.getSpawnedTotal(),
      arrived: this.vehicles.getRemovedTotal(),
      signals: this.signals.size
    };
  }

  /** Idle → running. Resolves false when the session could not be opened. */
  async start(): Promise<boolean> {
    if (this.state === "running") {
      this.onStatus("Simulation already running!");
      return false;
    }
    await this.settle();
    const generation = this.generation;
    let connection: SimulatorConnection | null;
    try {
      connection = await this.ensureConnected(generation);
    } catch (error) {
      console.error("[sim-loop] Failed to start simulation", error);
      this.onStatus(`ERROR starting simulation: ${errorMessage(error)}`);
      await this.release();
      return false;
    }
    if (!connection || generation !== this.generation) {
      this.onStatus("Simulation start cancelled.");
      return false;
    }
    if (this.getState() === "running") {
      return false;
    }
    this.generation += 1;
    this.setState("running");
    this.onStatus("Simulation started");
    this.scheduleTick(this.generation, 0);
    return true;
  }

  /**
   * Runs exactly one iteration without starting the periodic trigger. Opens
   * the session first when none is open; the loop stays idle afterwards.
   */
  async step(): Promise<boolean> {
    if (this.state === "running") {
      this.onStatus("Stop the simulation before stepping manually.");
      return false;
    }
    await this.settle();
    const generation = this.generation;
    let connection: SimulatorConnection | null;
    try {
      connection = await this.ensureConnected(generation);
    } catch (error) {
      console.error("[sim-loop] Failed to open simulation for stepping", error);
      this.onStatus(`ERROR starting simulation: ${errorMessage(error)}`);
      await this.release();
      return false;
    }
    if (!connection || generation !== this.generation) {
      return false;
    }
    const run = this.runIteration(connection, generation).catch((error: unknown) =>
      this.fail(error, generation)
    );
    this.inFlight = run;
    try {
      await run;
    } finally {
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    }
    return this.connection !== null;
  }

  /** Cancels the trigger, waits for a tick in flight, and closes the session. */
  async stop(): Promise<void> {
    const wasActive = this.state === "running" || this.connection !== null;
    this.generation += 1;
    this.opening = null;
    this.cancelTimer();
    await this.settle();
    const elapsed = this.timer.getFormattedTime();
    this.setState("idle");
    await this.release();
    if (wasActive) {
      this.onStatus(
        `Stopped. Time: ${elapsed}, Spawned: ${this.vehicles.getSpawnedTotal()}, Arrived: ${this.vehicles.getRemovedTotal()}`
      );
    }
  }

  /**
   * Resolves null when the run generation moved on while the session was
   * opening; the late connection is closed instead of kept.
   */
  private async ensureConnected(generation: number): Promise<SimulatorConnection | null> {
    if (this.connection) {
      return this.connection;
    }
    let opening = this.opening;
    if (!opening) {
      const next = this.openSession(generation).finally(() => {
        if (this.opening === next) {
          this.opening = null;
        }
      });
      this.opening = next;
      opening = next;
    }
    return opening;
  }

  private async openSession(generation: number): Promise<SimulatorConnection | null> {
    const topology = this.getTopology();
    if (!topology) {
      throw new Error("Load a network before starting the simulation.");
    }
    this.onStatus("Connecting to simulator...");
    const connection = await this.connectFn();
    if (generation !== this.generation) {
      await closeQuietly(connection);
      return null;
    }
    try {
      this.vehicles.clear();
      const signalInit = await this.signals.initialize(connection, topology);
      await this.vehicles.sync(connection);
      debugLog("session opened", signalInit);
    } catch (error) {
      await closeQuietly(connection);
      throw error;
    }
    if (generation !== this.generation) {
      await closeQuietly(connection);
      return null;
    }
    this.connection = connection;
    this.simTime = 0;
    this.timer.start();
    return connection;
  }

  private scheduleTick(generation: number, delayMs: number) {
    this.cancelTimer();
    this.timerHandle = this.setTimeoutFn(() => {
      this.timerHandle = null;
      const run = this.tick(generation);
      this.inFlight = run;
      void run.finally(() => {
        if (this.inFlight === run) {
          this.inFlight = null;
        }
      });
    }, delayMs);
  }

  private async tick(generation: number): Promise<void> {
    const connection = this.connection;
    if (!connection || generation !== this.generation || this.state !== "running") {
      return;
    }
    const startedAt = this.clock();
    try {
      await this.runIteration(connection, generation);
    } catch (error) {
      await this.fail(error, generation);
      return;
    }
    if (generation === this.generation && this.state === "running") {
      const spent = this.clock() - startedAt;
      this.scheduleTick(generation, Math.max(0, this.tickIntervalMs - spent));
    }
  }

  private async runIteration(connection: SimulatorConnection, generation: number): Promise<void> {
    const isCurrent = () => generation === this.generation && this.connection === connection;
    const simTime = await connection.step();
    if (!isCurrent()) {
      return;
    }
    this.simTime = simTime;
    const sync = await this.vehicles.sync(connection, isCurrent);
    if (!sync) {
      return;
    }
    await this.signals.refresh(connection, isCurrent);
    if (!isCurrent()) {
      return;
    }
    if (sync.failed.length) {
      debugLog(`vehicle reads failed for ${sync.failed.length} id(s)`);
    }
    this.onFrame({ simTime, elapsed: this.timer.getFormattedTime(), stats: this.getStats() });
  }

  private async fail(error: unknown, generation: number): Promise<void> {
    if (generation !== this.generation) {
      return;
    }
    console.error("[sim-loop] Simulation step error", error);
    this.generation += 1;
    this.cancelTimer();
    this.setState("idle");
    await this.release();
    this.onStatus(`Simulation step error: ${errorMessage(error)}`);
  }

  private async settle(): Promise<void> {
    const pending = this.inFlight;
    if (pending) {
      await pending;
    }
  }

  private async release(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.timer.stop();
    if (connection) {
      await closeQuietly(connection);
    }
  }

  private cancelTimer() {
    if (this.timerHandle !== null) {
      this.clearTimeoutFn(this.timerHandle);
      this.timerHandle = null;
    }
  }

  private setState(next: LoopState) {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.onStateChange(next);
  }
}

async function closeQuietly(connection: SimulatorConnection): Promise<void> {
  try {
    await connection.close();
  } catch (error) {
    console.warn("[sim-loop] Error closing simulator connection", error);
  }
}

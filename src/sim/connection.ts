/**
 * Handle on a running simulator session. The loop driver owns one handle at
 * a time and passes it to the stores; closing it ends the session.
 */
export interface SimulatorConnection {
  /** Advances by one step and returns the simulation time in seconds. */
  step(): Promise<number>;
  getVehicleIds(): Promise<string[]>;
  readVehicles(ids: readonly string[]): Promise<Array<EntityReading<VehicleSample>>>;
  getSignalIds(): Promise<string[]>;
  readSignals(ids: readonly string[]): Promise<Array<EntityReading<SignalSample>>>;
  setSignalState(id: string, state: string): Promise<void>;
  setSignalPhase(id: string, phaseIndex: number): Promise<void>;
  setSignalProgram(id: string, programId: string): Promise<void>;
  close(): Promise<void>;
}

export interface VehicleSample {
  type: string;
  x: number;
  y: number;
  speed: number;
  roadId: string;
  laneId: string;
  lanePosition: number;
}

export interface SignalSample {
  state: string;
  program: string;
  phase: number;
}

export type EntityReading<T> =
  | { id: string; ok: true; value: T }
  | { id: string; ok: false; error: string };

export interface LaunchRequest {
  configFile?: string;
  netFile?: string;
  routeFiles?: string[];
}

export type ConnectFn = () => Promise<SimulatorConnection>;

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createTopology } from "../network/types";
import type { LoopFrame, LoopState } from "../sim/simulationLoop";
import { SimulationLoop } from "../sim/simulationLoop";
import { SignalStore } from "../sim/signalStore";
import { VehicleStore } from "../sim/vehicleStore";
import { FakeSimulator, vehicleSample } from "./fakeSimulator";

const topology = createTopology(
  [
    { id: "J0", x: 0, y: 0, type: "dead_end" },
    { id: "J1", x: 50, y: 0, type: "traffic_light" }
  ],
  []
);

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup(options: { withTopology?: boolean; connectError?: Error } = {}) {
  const sim = new FakeSimulator();
  sim.vehicles.set("v1", vehicleSample(0, 0));
  sim.signals.set("J1", { state: "GrGr", program: "0", phase: 0 });
  const vehicles = new VehicleStore();
  const signals = new SignalStore();
  const frames: LoopFrame[] = [];
  const statuses: string[] = [];
  const states: LoopState[] = [];
  const connect = vi.fn(async () => {
    if (options.connectError) {
      throw options.connectError;
    }
    return sim;
  });
  const loop = new SimulationLoop({
    connect,
    getTopology: () => (options.withTopology === false ? null : topology),
    vehicles,
    signals,
    tickIntervalMs: 100,
    onFrame: (frame) => frames.push(frame),
    onStatus: (message) => statuses.push(message),
    onStateChange: (state) => states.push(state)
  });
  return { sim, vehicles, signals, frames, statuses, states, connect, loop };
}

function countSteps(sim: FakeSimulator): number {
  return sim.calls.filter((call) => call === "step").length;
}

describe("SimulationLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("opens the session, syncs, and ticks on the interval", async () => {
    const { sim, vehicles, signals, frames, statuses, states, loop } = setup();

    expect(await loop.start()).toBe(true);
    expect(loop.getState()).toBe("running");
    expect(states).toEqual(["running"]);
    expect(statuses).toEqual(["Connecting to simulator...", "Simulation started"]);
    expect(vehicles.size).toBe(1);
    expect(signals.size).toBe(1);

    await vi.advanceTimersByTimeAsync(0);
    await flush();
    expect(countSteps(sim)).toBe(1);
    expect(frames).toHaveLength(1);
    expect(frames[0]).toEqual({
      simTime: 1,
      elapsed: "00:00:00",
      stats: { vehicles: 1, spawned: 1, arrived: 0, signals: 1 }
    });

    await vi.advanceTimersByTimeAsync(100);
    await flush();
    expect(countSteps(sim)).toBe(2);
    expect(loop.getSimulationTime()).toBe(2);

    await loop.stop();
  });

  it("stops the trigger, closes the session and reports totals", async () => {
    const { sim, statuses, states, loop } = setup();
    await loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await flush();

    sim.vehicles.delete("v1");
    await vi.advanceTimersByTimeAsync(100);
    await flush();
    await loop.stop();

    expect(loop.getState()).toBe("idle");
    expect(loop.isConnected()).toBe(false);
    expect(sim.closed).toBe(true);
    expect(states).toEqual(["running", "idle"]);
    expect(statuses[statuses.length - 1]).toBe("Stopped. Time: 00:00:00, Spawned: 1, Arrived: 1");

    const steps = countSteps(sim);
    await vi.advanceTimersByTimeAsync(1000);
    await flush();
    expect(countSteps(sim)).toBe(steps);
  });

  it("refuses a second start while running", async () => {
    const { statuses, connect, loop } = setup();
    await loop.start();

    expect(await loop.start()).toBe(false);
    expect(statuses[statuses.length - 1]).toBe("Simulation already running!");
    expect(connect).toHaveBeenCalledTimes(1);

    await loop.stop();
  });

  it("steps once without starting the trigger and keeps the session open", async () => {
    const { sim, frames, states, loop } = setup();

    expect(await loop.step()).toBe(true);
    expect(loop.getState()).toBe("idle");
    expect(loop.isConnected()).toBe(true);
    expect(frames).toHaveLength(1);

    expect(await loop.step()).toBe(true);
    expect(countSteps(sim)).toBe(2);
    expect(sim.calls.filter((call) => call === "getSignalIds")).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1000);
    await flush();
    expect(countSteps(sim)).toBe(2);
    expect(states).toEqual([]);

    await loop.stop();
    expect(sim.closed).toBe(true);
  });

  it("rejects a manual step while running", async () => {
    const { statuses, loop } = setup();
    await loop.start();

    expect(await loop.step()).toBe(false);
    expect(statuses[statuses.length - 1]).toBe("Stop the simulation before stepping manually.");

    await loop.stop();
  });

  it("does not connect before a network is loaded", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { statuses, connect, loop } = setup({ withTopology: false });

    expect(await loop.start()).toBe(false);
    expect(connect).not.toHaveBeenCalled();
    expect(loop.getState()).toBe("idle");
    expect(statuses[statuses.length - 1]).toBe(
      "ERROR starting simulation: Load a network before starting the simulation."
    );
  });

  it("stays idle when the simulator cannot be reached", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { statuses, loop } = setup({ connectError: new Error("connection refused") });

    expect(await loop.start()).toBe(false);
    expect(loop.getState()).toBe("idle");
    expect(loop.isConnected()).toBe(false);
    expect(statuses[statuses.length - 1]).toBe("ERROR starting simulation: connection refused");
  });

  it("closes the session when the initial sync fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { sim, loop } = setup();
    vi.spyOn(sim, "getSignalIds").mockRejectedValue(new Error("boom"));

    expect(await loop.start()).toBe(false);
    expect(sim.closed).toBe(true);
    expect(loop.isConnected()).toBe(false);
  });

  it("goes idle and releases the session on a tick error", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { sim, statuses, states, loop } = setup();
    await loop.start();
    sim.stepError = new Error("lost connection");

    await vi.advanceTimersByTimeAsync(0);
    await flush();

    expect(loop.getState()).toBe("idle");
    expect(states).toEqual(["running", "idle"]);
    expect(sim.closed).toBe(true);
    expect(statuses[statuses.length - 1]).toBe("Simulation step error: lost connection");

    await vi.advanceTimersByTimeAsync(500);
    await flush();
    expect(countSteps(sim)).toBe(1);
  });

  it("leaves the stores untouched when a stop lands during a tick", async () => {
    const { sim, vehicles, frames, loop } = setup();
    await loop.start();
    let release: () => void = () => undefined;
    sim.onStep = () =>
      new Promise<void>((resolve) => {
        release = resolve;
      });

    await vi.advanceTimersByTimeAsync(0);
    await flush();
    expect(countSteps(sim)).toBe(1);

    sim.vehicles.set("v2", vehicleSample(10, 0));
    const stopping = loop.stop();
    release();
    await stopping;

    expect(vehicles.ids()).toEqual(["v1"]);
    expect(frames).toHaveLength(0);
    expect(sim.closed).toBe(true);
  });

  it("abandons a start that is stopped while connecting", async () => {
    const { sim, statuses, states, connect, loop } = setup();
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    connect.mockImplementationOnce(async () => {
      await gate;
      return sim;
    });

    const starting = loop.start();
    await flush();
    await loop.stop();
    open();

    expect(await starting).toBe(false);
    expect(loop.getState()).toBe("idle");
    expect(loop.isConnected()).toBe(false);
    expect(sim.closed).toBe(true);
    expect(states).toEqual([]);
    expect(statuses[statuses.length - 1]).toBe("Simulation start cancelled.");

    await vi.advanceTimersByTimeAsync(500);
    await flush();
    expect(countSteps(sim)).toBe(0);
  });

  it("abandons a manual step that is stopped while connecting", async () => {
    const { sim, connect, loop } = setup();
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    connect.mockImplementationOnce(async () => {
      await gate;
      return sim;
    });

    const stepping = loop.step();
    await flush();
    await loop.stop();
    open();

    expect(await stepping).toBe(false);
    expect(loop.isConnected()).toBe(false);
    expect(sim.closed).toBe(true);
    expect(countSteps(sim)).toBe(0);
  });
});

import { describe, it, expect } from "vitest";
import { DEFAULT_VIEWER_SETTINGS } from "../config";
import { createTopology } from "../network/types";
import { findNearestVehicle, pickAt } from "../selection";
import { SignalStore } from "../sim/signalStore";
import { VehicleStore } from "../sim/vehicleStore";
import { FakeSimulator, vehicleSample } from "./fakeSimulator";

async function setup() {
  const sim = new FakeSimulator();
  sim.signals.set("J1", { state: "G", program: "0", phase: 0 });
  const signals = new SignalStore();
  await signals.initialize(
    sim,
    createTopology([{ id: "J1", x: 50, y: 0, type: "traffic_light" }], [])
  );
  const vehicles = new VehicleStore();
  vehicles.apply(
    ["v1", "v2"],
    [
      { id: "v1", ok: true, value: vehicleSample(45, 0) },
      { id: "v2", ok: true, value: vehicleSample(3, 0) }
    ]
  );
  return { signals, vehicles };
}

describe("findNearestVehicle", () => {
  it("needs the distance to be strictly inside the tolerance", async () => {
    const { vehicles } = await setup();

    expect(findNearestVehicle(vehicles.values(), 0, 0, 3)).toBeNull();
    expect(findNearestVehicle(vehicles.values(), 0, 0, 3.01)?.id).toBe("v2");
  });
});

describe("pickAt", () => {
  it("prefers a signal over a nearer vehicle", async () => {
    const { signals, vehicles } = await setup();

    expect(pickAt(46, 0, 1, signals, vehicles, DEFAULT_VIEWER_SETTINGS)).toEqual({ kind: "signal", id: "J1" });
  });

  it("scales the vehicle radius with the zoom", async () => {
    const { signals, vehicles } = await setup();

    expect(pickAt(0, 0, 1, signals, vehicles, DEFAULT_VIEWER_SETTINGS)).toEqual({ kind: "vehicle", id: "v2" });
    expect(pickAt(0, 0, 2, signals, vehicles, DEFAULT_VIEWER_SETTINGS)).toEqual({ kind: "vehicle", id: "v2" });
    expect(pickAt(0, 0, 4, signals, vehicles, DEFAULT_VIEWER_SETTINGS)).toBeNull();
  });

  it("returns nothing for empty space", async () => {
    const { signals, vehicles } = await setup();

    expect(pickAt(20, 30, 1, signals, vehicles, DEFAULT_VIEWER_SETTINGS)).toBeNull();
  });
});

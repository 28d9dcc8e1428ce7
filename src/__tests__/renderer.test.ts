import { existsSync } from "fs";
import { resolve } from "path";
import { describe, it, expect, vi } from "vitest";
import { DEFAULT_VIEWER_SETTINGS } from "../config";
import { createTopology } from "../network/types";
import {
  DrawContext,
  LAMP_COLORS,
  LoadableImage,
  Renderer,
  VehicleImageCache,
  createFrameScheduler,
  truncateLabel
} from "../render/renderer";
import { createVehicleState } from "../sim/vehicleStore";
import { Viewport } from "../viewport";

type Style = string | CanvasGradient | CanvasPattern;

/** Records the canvas calls a render makes. */
class RecordingContext implements DrawContext {
  readonly calls: string[] = [];
  readonly fills: string[] = [];
  readonly texts: string[] = [];
  strokeStyle: Style = "";
  lineWidth = 1;
  lineCap: CanvasLineCap = "butt";
  lineJoin: CanvasLineJoin = "miter";
  font = "";
  textAlign: CanvasTextAlign = "start";
  private currentFill: Style = "";

  get fillStyle(): Style {
    return this.currentFill;
  }

  set fillStyle(value: Style) {
    this.currentFill = value;
    if (typeof value === "string") {
      this.fills.push(value);
    }
  }

  save() {}
  restore() {}
  translate() {}
  rotate() {}
  beginPath() {}
  moveTo() {}
  lineTo() {}
  arc() {}
  fill() {}
  stroke() {}
  strokeRect() {}
  setLineDash() {}
  drawImage() {}

  clearRect(x: number, y: number, w: number, h: number) {
    this.calls.push(`clearRect(${x},${y},${w},${h})`);
  }

  fillRect(x: number, y: number, w: number, h: number) {
    this.calls.push(`fillRect(${x},${y},${w},${h})`);
  }

  fillText(text: string, x: number, y: number) {
    this.texts.push(`${text}@${x},${y}`);
  }
}

describe("truncateLabel", () => {
  it("cuts long labels and appends the ellipsis", () => {
    expect(truncateLabel("vehicle_long", 8)).toBe("vehicle_");
    expect(truncateLabel("cluster_J12_J13", 10, "...")).toBe("cluster_J1...");
    expect(truncateLabel("J1", 10, "...")).toBe("J1");
  });
});

class FakeImage implements LoadableImage {
  src = "";
  complete = false;
  naturalWidth = 0;
}

describe("VehicleImageCache", () => {
  it("ships an image for every default vehicle type", () => {
    const sources = DEFAULT_VIEWER_SETTINGS.vehicleImages;
    expect(Object.keys(sources).sort()).toEqual(["bike", "bus", "car", "motorcycle", "truck"]);
    for (const src of Object.values(sources)) {
      expect(existsSync(resolve("public", src))).toBe(true);
    }
  });

  it("serves an image once it has decoded, falling back to the car", () => {
    const created: FakeImage[] = [];
    const cache = new VehicleImageCache(DEFAULT_VIEWER_SETTINGS.vehicleImages, () => {
      const image = new FakeImage();
      created.push(image);
      return image;
    });

    expect(cache.get("Bus")).toBeNull();
    expect(created.map((image) => image.src)).toEqual(["vehicles/bus.svg"]);

    created[0].complete = true;
    created[0].naturalWidth = 90;
    expect(cache.get("bus")).toBe(created[0]);

    cache.get("tram");
    expect(created.map((image) => image.src)).toEqual(["vehicles/bus.svg", "vehicles/car.svg"]);
    expect(created).toHaveLength(2);
  });

  it("returns nothing without any sources", () => {
    const cache = new VehicleImageCache({}, () => new FakeImage());
    expect(cache.get("car")).toBeNull();
  });
});

describe("createFrameScheduler", () => {
  it("draws once per frame however often it is asked", () => {
    const frames: Array<() => void> = [];
    const draw = vi.fn();
    const request = createFrameScheduler(draw, (callback) => frames.push(callback));

    request();
    request();
    request();
    expect(frames).toHaveLength(1);
    expect(draw).not.toHaveBeenCalled();

    frames[0]();
    expect(draw).toHaveBeenCalledTimes(1);

    request();
    expect(frames).toHaveLength(2);
  });
});

describe("Renderer", () => {
  it("only clears the canvas without a network", () => {
    const ctx = new RecordingContext();
    new Renderer(ctx, new Viewport()).render({
      topology: null,
      vehicles: [],
      signals: [],
      selection: null,
      showDetails: true
    });

    expect(ctx.calls).toEqual(["clearRect(0,0,800,600)", "fillRect(0,0,800,600)"]);
    expect(ctx.fills).toEqual(["#1f2933"]);
  });

  it("colours signals by their dominant lamp and labels vehicles", () => {
    const ctx = new RecordingContext();
    const vehicle = createVehicleState("vehicle_long", 0, 0, 0, "rgb(20, 100, 220)");
    vehicle.speed = 12.34;

    new Renderer(ctx, new Viewport({ zoom: 2 })).render({
      topology: createTopology([{ id: "J1", x: 50, y: 0, type: "traffic_light" }], []),
      vehicles: [vehicle],
      signals: [{ id: "J1", x: 50, y: 0, state: "yyrr", program: "0", phase: 1 }],
      selection: null,
      showDetails: true
    });

    expect(ctx.fills).toContain(LAMP_COLORS.yellow);
    expect(ctx.fills).toContain("rgb(20, 100, 220)");
    expect(ctx.texts).toEqual(["vehicle_@0,592", "12.3 m/s@0,616"]);
  });

  it("hides labels when details are off", () => {
    const ctx = new RecordingContext();
    const vehicle = createVehicleState("v1", 0, 0, 0, "rgb(20, 100, 220)");
    vehicle.speed = 5;

    new Renderer(ctx, new Viewport({ zoom: 4 })).render({
      topology: createTopology([], []),
      vehicles: [vehicle],
      signals: [{ id: "J1", x: 50, y: 0, state: "GrGr", program: "0", phase: 0 }],
      selection: null,
      showDetails: false
    });

    expect(ctx.texts).toEqual([]);
    expect(ctx.fills).toContain(LAMP_COLORS.green);
  });
});

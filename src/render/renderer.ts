import type { Topology } from "../network/types";
import type { Selection } from "../selection";
import { SignalLamp, SignalState, dominantLamp } from "../sim/signalStore";
import type { VehicleState } from "../sim/vehicleStore";
import type { Viewport } from "../viewport";

export type DrawContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "translate"
  | "rotate"
  | "clearRect"
  | "fillRect"
  | "strokeRect"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "arc"
  | "fill"
  | "stroke"
  | "fillText"
  | "drawImage"
  | "setLineDash"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "lineCap"
  | "lineJoin"
  | "font"
  | "textAlign"
>;

export interface RenderScene {
  topology: Topology | null;
  vehicles: readonly VehicleState[];
  signals: readonly SignalState[];
  selection: Selection | null;
  showDetails: boolean;
}

const VEHICLE_LENGTH_M = 4.5;
const VEHICLE_WIDTH_M = 2.0;
const SIGNAL_SIZE_M = 3.5;
const JUNCTION_RADIUS_M = 1.2;
const VEHICLE_LABEL_CHARS = 8;
const SIGNAL_LABEL_CHARS = 10;
const MIN_MOVING_SPEED = 0.1;

const BACKGROUND = "#1f2933";
const LANE_STROKE = "rgb(80, 80, 80)";
const LANE_DASH_STROKE = "rgb(255, 255, 200)";
const JUNCTION_FILL = "rgb(200, 50, 50)";
const WINDSHIELD_FILL = "rgba(200, 220, 255, 0.9)";
const SIGNAL_HOUSING_FILL = "rgba(40, 40, 40, 0.9)";
const SIGNAL_HOUSING_STROKE = "rgb(80, 80, 80)";
const SELECTION_STROKE = "#38bdf8";
const LABEL_FILL = "#ffffff";
const SPEED_LABEL_FILL = "rgb(0, 160, 0)";

export const LAMP_COLORS: Record<SignalLamp, string> = {
  green: "#22c55e",
  yellow: "#facc15",
  red: "#ef4444",
  off: "rgb(100, 100, 100)"
};

export function truncateLabel(text: string, maxChars: number, ellipsis = ""): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}${ellipsis}` : text;
}

/** The parts of an image element the cache reads to tell whether it has decoded. */
export interface LoadableImage {
  src: string;
  readonly complete: boolean;
  readonly naturalWidth: number;
}

/** Loads vehicle images per type on first request and serves them once decoded. */
export class VehicleImageCache<T extends LoadableImage = HTMLImageElement> {
  private readonly sources: Record<string, string>;
  private readonly createImage: () => T;
  private readonly images = new Map<string, T>();

  constructor(sources: Record<string, string>, createImage: () => T) {
    this.sources = sources;
    this.createImage = createImage;
  }

  get(type: string): T | null {
    const key = this.sources[type.toLowerCase()] ? type.toLowerCase() : "car";
    const src = this.sources[key];
    if (!src) {
      return null;
    }
    let image = this.images.get(key);
    if (!image) {
      image = this.createImage();
      image.src = src;
      this.images.set(key, image);
    }
    return image.complete && image.naturalWidth > 0 ? image : null;
  }
}

/**
 * Coalesces redraw requests: however often `request` is called between two
 * animation frames, `draw` runs once on the next one.
 */
export function createFrameScheduler(
  draw: () => void,
  requestFrame: (callback: () => void) => unknown = (callback) => requestAnimationFrame(callback)
): () => void {
  let pending = false;
  return () => {
    if (pending) {
      return;
    }
    pending = true;
    requestFrame(() => {
      pending = false;
      draw();
    });
  };
}

export class Renderer {
  private readonly ctx: DrawContext;
  private readonly viewport: Viewport;
  private readonly images: VehicleImageCache | null;

  constructor(ctx: DrawContext, viewport: Viewport, images: VehicleImageCache | null = null) {
    this.ctx = ctx;
    this.viewport = viewport;
    this.images = images;
  }

  render(scene: RenderScene): void {
    const { width, height } = this.viewport.getCanvasSize();
    this.ctx.clearRect(0, 0, width, height);
    this.ctx.fillStyle = BACKGROUND;
    this.ctx.fillRect(0, 0, width, height);
    if (!scene.topology) {
      return;
    }
    this.drawLanes(scene.topology);
    this.drawJunctions(scene.topology);
    for (const vehicle of scene.vehicles) {
      this.drawVehicle(vehicle, scene.showDetails);
    }
    for (const signal of scene.signals) {
      this.drawSignal(signal, scene.showDetails);
    }
    if (scene.selection) {
      this.drawSelection(scene);
    }
  }

  private drawLanes(topology: Topology) {
    const zoom = this.viewport.getZoom();
    const ctx = this.ctx;
    ctx.lineCap = "round";
    ctx.lineJoin = "round";
    for (const segment of topology.segments) {
      for (const lane of segment.lanes) {
        if (lane.shape.length < 2) {
          continue;
        }
        ctx.strokeStyle = LANE_STROKE;
        ctx.lineWidth = lane.width * zoom;
        this.tracePolyline(lane.shape);
        ctx.stroke();
        if (zoom > 2) {
          ctx.strokeStyle = LANE_DASH_STROKE;
          ctx.lineWidth = 0.3;
          ctx.setLineDash([5, 5]);
          this.tracePolyline(lane.shape);
          ctx.stroke();
          ctx.setLineDash([]);
        }
      }
    }
  }

  private tracePolyline(points: ReadonlyArray<{ x: number; y: number }>) {
    this.ctx.beginPath();
    points.forEach((point, index) => {
      const screen = this.viewport.worldToScreen(point);
      if (index === 0) {
        this.ctx.moveTo(screen.x, screen.y);
      } else {
        this.ctx.lineTo(screen.x, screen.y);
      }
    });
  }

  private drawJunctions(topology: Topology) {
    const zoom = this.viewport.getZoom();
    if (zoom < 1) {
      return;
    }
    const radius = JUNCTION_RADIUS_M * zoom;
    this.ctx.fillStyle = JUNCTION_FILL;
    for (const junction of topology.junctions) {
      const screen = this.viewport.worldToScreen(junction);
      this.ctx.beginPath();
      this.ctx.arc(screen.x, screen.y, radius, 0, Math.PI * 2);
      this.ctx.fill();
    }
  }

  private drawVehicle(vehicle: VehicleState, showDetails: boolean) {
    const zoom = this.viewport.getZoom();
    const ctx = this.ctx;
    const screen = this.viewport.worldToScreen(vehicle);
    const length = VEHICLE_LENGTH_M * zoom;
    const width = VEHICLE_WIDTH_M * zoom;
    const image = zoom > 0.5 ? this.images?.get(vehicle.type) ?? null : null;

    ctx.save();
    ctx.translate(screen.x, screen.y);
    // World angles are counter-clockwise; canvas rotation is clockwise.
    ctx.rotate((-vehicle.angle * Math.PI) / 180);
    if (image) {
      ctx.fillStyle = vehicle.color;
      ctx.fillRect(-length / 2 - 1, -width / 2 - 1, length + 2, width + 2);
      ctx.drawImage(image, -length / 2, -width / 2, length, width);
    } else {
      ctx.fillStyle = vehicle.color;
      ctx.fillRect(-length / 2, -width / 2, length, width);
      ctx.fillStyle = WINDSHIELD_FILL;
      ctx.fillRect(length / 4, -width / 2 + 0.5, length / 4, Math.max(0, width - 1));
      ctx.strokeStyle = "#000000";
      ctx.lineWidth = 0.3;
      ctx.strokeRect(-length / 2, -width / 2, length, width);
    }
    ctx.restore();

    if (showDetails && zoom > 1) {
      ctx.font = "10px sans-serif";
      ctx.textAlign = "center";
      ctx.fillStyle = LABEL_FILL;
      ctx.fillText(truncateLabel(vehicle.id, VEHICLE_LABEL_CHARS), screen.x, screen.y - width - 4);
      if (vehicle.speed > MIN_MOVING_SPEED) {
        ctx.fillStyle = SPEED_LABEL_FILL;
        ctx.fillText(`${vehicle.speed.toFixed(1)} m/s`, screen.x, screen.y + width + 12);
      }
    }
  }

  private drawSignal(signal: SignalState, showDetails: boolean) {
    const zoom = this.viewport.getZoom();
    const ctx = this.ctx;
    const screen = this.viewport.worldToScreen(signal);
    const size = SIGNAL_SIZE_M * zoom;
    const lamp = dominantLamp(signal.state);

    ctx.fillStyle = SIGNAL_HOUSING_FILL;
    ctx.fillRect(screen.x - size / 2 - 2, screen.y - size / 2 - 2, size + 4, size + 4);
    ctx.strokeStyle = SIGNAL_HOUSING_STROKE;
    ctx.lineWidth = 1;
    ctx.strokeRect(screen.x - size / 2 - 2, screen.y - size / 2 - 2, size + 4, size + 4);

    ctx.fillStyle = LAMP_COLORS[lamp];
    ctx.beginPath();
    ctx.arc(screen.x, screen.y, size / 2, 0, Math.PI * 2);
    ctx.fill();
    ctx.strokeStyle = "#000000";
    ctx.lineWidth = 0.8;
    ctx.stroke();

    if (showDetails && zoom > 2) {
      ctx.font = "8px sans-serif";
      ctx.textAlign = "center";
      ctx.fillStyle = LABEL_FILL;
      ctx.fillText(truncateLabel(signal.id, SIGNAL_LABEL_CHARS, "..."), screen.x, screen.y + size + 8);
    }
  }

  private drawSelection(scene: RenderScene) {
    const selection = scene.selection;
    if (!selection) {
      return;
    }
    const target =
      selection.kind === "signal"
        ? scene.signals.find((signal) => signal.id === selection.id)
        : scene.vehicles.find((vehicle) => vehicle.id === selection.id);
    if (!target) {
      return;
    }
    const screen = this.viewport.worldToScreen(target);
    const radius = Math.max(8, VEHICLE_LENGTH_M * this.viewport.getZoom());
    this.ctx.strokeStyle = SELECTION_STROKE;
    this.ctx.lineWidth = 2;
    this.ctx.beginPath();
    this.ctx.arc(screen.x, screen.y, radius, 0, Math.PI * 2);
    this.ctx.stroke();
  }
}

import { WorldBounds, WorldPoint } from "./network/types";

/** Zoom values at or below this floor are ignored. */
export const MIN_ZOOM_EXCLUSIVE = 0.1;
export const AUTO_FIT_PADDING = 1.1;

export interface ViewportOptions {
  zoom?: number;
  offsetX?: number;
  offsetY?: number;
  canvasWidth?: number;
  canvasHeight?: number;
}

/**
 * World/screen transform for the map canvas. World Y grows upward while
 * canvas Y grows downward, so the Y axis is flipped against the canvas height.
 */
export class Viewport {
  private zoom: number;
  private offsetX: number;
  private offsetY: number;
  private canvasWidth: number;
  private canvasHeight: number;

  constructor(options: ViewportOptions = {}) {
    this.zoom = options.zoom ?? 1;
    this.offsetX = options.offsetX ?? 0;
    this.offsetY = options.offsetY ?? 0;
    this.canvasWidth = options.canvasWidth ?? 800;
    this.canvasHeight = options.canvasHeight ?? 600;
  }

  getZoom(): number {
    return this.zoom;
  }

  getOffset(): WorldPoint {
    return { x: this.offsetX, y: this.offsetY };
  }

  getCanvasSize(): { width: number; height: number } {
    return { width: this.canvasWidth, height: this.canvasHeight };
  }

  setCanvasDimensions(width: number, height: number): void {
    this.canvasWidth = width;
    this.canvasHeight = height;
  }

  setOffset(offsetX: number, offsetY: number): void {
    this.offsetX = offsetX;
    this.offsetY = offsetY;
  }

  /** Returns false when the value was rejected by the zoom floor. */
  setZoom(zoom: number): boolean {
    if (zoom > MIN_ZOOM_EXCLUSIVE) {
      this.zoom = zoom;
      return true;
    }
    return false;
  }

  zoomBy(factor: number): boolean {
    return this.setZoom(this.zoom * factor);
  }

  pan(deltaScreenX: number, deltaScreenY: number): void {
    this.offsetX -= deltaScreenX / this.zoom;
    this.offsetY += deltaScreenY / this.zoom;
  }

  worldToScreenX(worldX: number): number {
    return (worldX - this.offsetX) * this.zoom;
  }

  worldToScreenY(worldY: number): number {
    return this.canvasHeight - (worldY - this.offsetY) * this.zoom;
  }

  worldToScreen(point: WorldPoint): WorldPoint {
    return { x: this.worldToScreenX(point.x), y: this.worldToScreenY(point.y) };
  }

  screenToWorldX(screenX: number): number {
    return screenX / this.zoom + this.offsetX;
  }

  screenToWorldY(screenY: number): number {
    return (this.canvasHeight - screenY) / this.zoom + this.offsetY;
  }

  screenToWorld(point: WorldPoint): WorldPoint {
    return { x: this.screenToWorldX(point.x), y: this.screenToWorldY(point.y) };
  }

  /**
   * Fits the bounds into the canvas with a padding margin and centres them.
   * An axis with zero extent does not constrain the zoom; when both axes are
   * degenerate nothing changes. Returns whether the view was updated.
   */
  fitToBounds(bounds: WorldBounds | null, padding = AUTO_FIT_PADDING): boolean {
    if (!bounds) {
      return false;
    }
    const boxWidth = bounds.maxX - bounds.minX;
    const boxHeight = bounds.maxY - bounds.minY;
    const candidates: number[] = [];
    if (boxWidth > 0) {
      candidates.push(this.canvasWidth / (boxWidth * padding));
    }
    if (boxHeight > 0) {
      candidates.push(this.canvasHeight / (boxHeight * padding));
    }
    if (!candidates.length) {
      return false;
    }
    this.setZoom(Math.min(...candidates));
    this.offsetX = bounds.minX - (this.canvasWidth / this.zoom - boxWidth) / 2;
    this.offsetY = bounds.minY - (this.canvasHeight / this.zoom - boxHeight) / 2;
    return true;
  }
}

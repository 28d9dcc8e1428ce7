export type JunctionId = string;
export type SegmentId = string;

/** Segment ids with this prefix describe geometry inside a junction. */
export const INTERNAL_ID_PREFIX = ":";

/** Lane width SUMO assumes when a lane carries no width attribute. */
export const DEFAULT_LANE_WIDTH_M = 3.2;

export interface WorldPoint {
  x: number;
  y: number;
}

export interface Junction extends WorldPoint {
  id: JunctionId;
  type: string;
}

export interface Lane {
  id: string;
  width: number;
  shape: WorldPoint[];
}

export interface RoadSegment {
  id: SegmentId;
  from: JunctionId | null;
  to: JunctionId | null;
  internal: boolean;
  lanes: Lane[];
}

export interface Topology {
  junctions: Junction[];
  segments: RoadSegment[];
  junctionById: Map<JunctionId, Junction>;
}

export interface WorldBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function isInternalSegmentId(id: string): boolean {
  return id.startsWith(INTERNAL_ID_PREFIX);
}

export function createTopology(junctions: Junction[], segments: RoadSegment[]): Topology {
  const junctionById = new Map<JunctionId, Junction>();
  for (const junction of junctions) {
    junctionById.set(junction.id, junction);
  }
  return { junctions, segments, junctionById };
}

export function computeJunctionBounds(junctions: readonly Junction[]): WorldBounds | null {
  if (!junctions.length) {
    return null;
  }
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const junction of junctions) {
    if (junction.x < minX) minX = junction.x;
    if (junction.x > maxX) maxX = junction.x;
    if (junction.y < minY) minY = junction.y;
    if (junction.y > maxY) maxY = junction.y;
  }
  return { minX, minY, maxX, maxY };
}

import { JunctionId, RoadSegment, SegmentId, Topology } from "./types";

export interface EndpointClassification {
  entryEdges: SegmentId[];
  exitEdges: SegmentId[];
  entryFallback: boolean;
  exitFallback: boolean;
}

/**
 * Splits the non-internal segments into spawn (entry) and destination (exit)
 * candidates for a traffic generator. A segment qualifies as an entry when its
 * origin junction is fed by at most one segment, and as an exit when its
 * destination junction feeds at most one segment. Networks without any such
 * boundary (pure cycles) fall back to every non-internal segment.
 */
export function classifyEndpoints(topology: Pick<Topology, "segments">): EndpointClassification {
  const segments = topology.segments.filter(isTraversable);
  const incoming = new Map<JunctionId, Set<SegmentId>>();
  const outgoing = new Map<JunctionId, Set<SegmentId>>();

  for (const segment of segments) {
    addToIndex(outgoing, segment.from, segment.id);
    addToIndex(incoming, segment.to, segment.id);
  }

  const entryEdges: SegmentId[] = [];
  const exitEdges: SegmentId[] = [];
  for (const segment of segments) {
    if (countAt(incoming, segment.from) <= 1) {
      entryEdges.push(segment.id);
    }
    if (countAt(outgoing, segment.to) <= 1) {
      exitEdges.push(segment.id);
    }
  }

  const allIds = segments.map((segment) => segment.id);
  const entryFallback = entryEdges.length === 0;
  const exitFallback = exitEdges.length === 0;
  return {
    entryEdges: entryFallback ? allIds : entryEdges,
    exitEdges: exitFallback ? allIds.slice() : exitEdges,
    entryFallback,
    exitFallback
  };
}

function isTraversable(segment: RoadSegment): boolean {
  return !segment.internal;
}

function addToIndex(
  index: Map<JunctionId, Set<SegmentId>>,
  junctionId: JunctionId | null,
  segmentId: SegmentId
) {
  if (junctionId === null) {
    return;
  }
  const set = index.get(junctionId);
  if (set) {
    set.add(segmentId);
  } else {
    index.set(junctionId, new Set([segmentId]));
  }
}

function countAt(index: Map<JunctionId, Set<SegmentId>>, junctionId: JunctionId | null): number {
  if (junctionId === null) {
    return 0;
  }
  return index.get(junctionId)?.size ?? 0;
}

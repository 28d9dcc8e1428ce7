import { gunzipSync, strFromU8 } from "fflate";
import {
  DEFAULT_LANE_WIDTH_M,
  Junction,
  Lane,
  RoadSegment,
  Topology,
  WorldPoint,
  createTopology,
  isInternalSegmentId
} from "./types";
import { XmlRecord, asRecord, childRecords, parseXmlDocument, readNumber, readString } from "./xml";

const GZIP_MAGIC_0 = 0x1f;
const GZIP_MAGIC_1 = 0x8b;

/**
 * Decodes the raw bytes of a network file. SUMO writes `.net.xml.gz`
 * networks as plain gzip streams, so the magic header decides, not the name.
 */
export function decodeNetworkFile(bytes: Uint8Array): string {
  if (bytes.length >= 2 && bytes[0] === GZIP_MAGIC_0 && bytes[1] === GZIP_MAGIC_1) {
    return strFromU8(gunzipSync(bytes));
  }
  return strFromU8(bytes);
}

export function parseNetwork(xml: string): Topology {
  const document = parseXmlDocument(xml, "Network file");
  const netRecord = asRecord(document.net);
  if (!netRecord) {
    throw new Error("Network file has no <net> element.");
  }

  const junctions = childRecords(netRecord, "junction").map(parseJunction);
  const segments = childRecords(netRecord, "edge").map(parseSegment);
  return createTopology(junctions, segments);
}

function parseJunction(record: XmlRecord): Junction {
  const id = readString(record, "id");
  if (!id) {
    throw new Error("Junction without id.");
  }
  const x = readNumber(record, "x");
  const y = readNumber(record, "y");
  if (x === null || y === null) {
    throw new Error(`Junction ${id} has invalid coordinates.`);
  }
  return { id, x, y, type: readString(record, "type") ?? "unknown" };
}

function parseSegment(record: XmlRecord): RoadSegment {
  const id = readString(record, "id");
  if (!id) {
    throw new Error("Edge without id.");
  }
  const internal = isInternalSegmentId(id);
  const from = readString(record, "from");
  const to = readString(record, "to");
  if (!internal && (!from || !to)) {
    throw new Error(`Edge ${id} is missing from/to junctions.`);
  }
  const lanes = childRecords(record, "lane").map((lane) => parseLane(lane, id));
  return { id, from, to, internal, lanes };
}

function parseLane(record: XmlRecord, segmentId: string): Lane {
  const id = readString(record, "id");
  if (!id) {
    throw new Error(`Lane without id on edge ${segmentId}.`);
  }
  const shapeText = readString(record, "shape");
  const shape = shapeText ? parseShape(shapeText) : [];
  if (!shape) {
    throw new Error(`Lane ${id} has a malformed shape.`);
  }
  return {
    id,
    width: readNumber(record, "width") ?? DEFAULT_LANE_WIDTH_M,
    shape
  };
}

/** Parses SUMO's `"x1,y1 x2,y2 ..."` notation. A z component is ignored. */
export function parseShape(text: string): WorldPoint[] | null {
  const points: WorldPoint[] = [];
  for (const token of text.trim().split(/\s+/)) {
    const parts = token.split(",");
    if (parts.length < 2) {
      return null;
    }
    const x = Number(parts[0]);
    const y = Number(parts[1]);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      return null;
    }
    points.push({ x, y });
  }
  return points;
}

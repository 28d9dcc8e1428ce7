import { describe, it, expect } from "vitest";
import { classifyEndpoints } from "../network/endpoints";
import type { RoadSegment } from "../network/types";

function segment(id: string, from: string | null, to: string | null): RoadSegment {
  return { id, from, to, internal: id.startsWith(":"), lanes: [] };
}

describe("classifyEndpoints", () => {
  it("treats both ends of a simple cycle as candidates everywhere", () => {
    const result = classifyEndpoints({
      segments: [segment("AB", "A", "B"), segment("BC", "B", "C"), segment("CA", "C", "A")]
    });

    expect(new Set(result.entryEdges)).toEqual(new Set(["AB", "BC", "CA"]));
    expect(new Set(result.exitEdges)).toEqual(new Set(["AB", "BC", "CA"]));
  });

  it("marks the outgoing segment of a source junction as an entry", () => {
    // S feeds the hub H, which is also fed by X and Y; H drains into Z and W.
    const result = classifyEndpoints({
      segments: [
        segment("SH", "S", "H"),
        segment("XH", "X", "H"),
        segment("YH", "Y", "H"),
        segment("HZ", "H", "Z"),
        segment("HW", "H", "W")
      ]
    });

    expect(result.entryEdges).toEqual(["SH", "XH", "YH"]);
    expect(result.exitEdges).toEqual(["HZ", "HW"]);
    expect(result.entryFallback).toBe(false);
    expect(result.exitFallback).toBe(false);
  });

  it("falls back to every normal segment when no boundary exists", () => {
    const result = classifyEndpoints({
      segments: [
        segment("AB1", "A", "B"),
        segment("AB2", "A", "B"),
        segment("BA1", "B", "A"),
        segment("BA2", "B", "A"),
        segment(":A_0", null, null)
      ]
    });

    expect(result.entryFallback).toBe(true);
    expect(result.exitFallback).toBe(true);
    expect(result.entryEdges).toEqual(["AB1", "AB2", "BA1", "BA2"]);
    expect(result.exitEdges).toEqual(["AB1", "AB2", "BA1", "BA2"]);
  });

  it("never lists internal segments", () => {
    const result = classifyEndpoints({
      segments: [segment("E0", "J0", "J1"), segment(":J1_0", null, null), segment("E1", "J1", "J2")]
    });

    expect(result.entryEdges).not.toContain(":J1_0");
    expect(result.exitEdges).not.toContain(":J1_0");
    expect(result.entryEdges).toEqual(["E0", "E1"]);
  });
});

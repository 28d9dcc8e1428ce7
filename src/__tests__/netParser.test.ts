import { describe, it, expect } from "vitest";
import { gzipSync, strToU8 } from "fflate";
import { decodeNetworkFile, parseNetwork, parseShape } from "../network/netParser";
import { DEFAULT_LANE_WIDTH_M } from "../network/types";

const NETWORK_XML = `<?xml version="1.0" encoding="UTF-8"?>
<net version="1.20">
    <location netOffset="0.00,0.00" convBoundary="0.00,0.00,100.00,0.00"/>
    <edge id=":J1_0" function="internal">
        <lane id=":J1_0_0" index="0" speed="13.89" length="0.10" shape="50.00,-1.60 50.00,-1.60"/>
    </edge>
    <edge id="E0" from="J0" to="J1" priority="-1">
        <lane id="E0_0" index="0" speed="13.89" length="50.00" width="3.5" shape="0.00,-1.60 50.00,-1.60"/>
        <lane id="E0_1" index="1" speed="13.89" length="50.00" shape="0.00,1.60 25.00,1.60,0.00 50.00,1.60"/>
    </edge>
    <edge id="E1" from="J1" to="J2" priority="-1">
        <lane id="E1_0" index="0" speed="13.89" length="50.00" shape="50.00,-1.60 100.00,-1.60"/>
    </edge>
    <junction id="J0" type="dead_end" x="0.00" y="0.00" incLanes="" intLanes="" shape="0.00,0.00"/>
    <junction id="J1" type="traffic_light" x="50.00" y="0.00" incLanes="E0_0" intLanes=":J1_0_0" shape="50.00,0.00"/>
    <junction id="J2" type="dead_end" x="100.00" y="0.00" incLanes="E1_0" intLanes="" shape="100.00,0.00"/>
</net>
`;

describe("parseNetwork", () => {
  it("reads junctions, segments and lanes", () => {
    const topology = parseNetwork(NETWORK_XML);

    expect(topology.junctions.map((junction) => junction.id)).toEqual(["J0", "J1", "J2"]);
    expect(topology.junctionById.get("J1")).toEqual({ id: "J1", x: 50, y: 0, type: "traffic_light" });
    expect(topology.segments.map((segment) => segment.id)).toEqual([":J1_0", "E0", "E1"]);

    const internal = topology.segments[0];
    expect(internal.internal).toBe(true);
    expect(internal.from).toBeNull();
    expect(internal.to).toBeNull();

    const e0 = topology.segments[1];
    expect(e0).toMatchObject({ id: "E0", from: "J0", to: "J1", internal: false });
    expect(e0.lanes).toHaveLength(2);
    expect(e0.lanes[0].width).toBe(3.5);
    expect(e0.lanes[1].width).toBe(DEFAULT_LANE_WIDTH_M);
    expect(e0.lanes[1].shape).toEqual([
      { x: 0, y: 1.6 },
      { x: 25, y: 1.6 },
      { x: 50, y: 1.6 }
    ]);
  });

  it("keeps a single edge and junction as one-element lists", () => {
    const topology = parseNetwork(`<net>
      <edge id="A" from="X" to="Y"><lane id="A_0" shape="0,0 10,0"/></edge>
      <junction id="X" x="0" y="0"/>
    </net>`);

    expect(topology.segments).toHaveLength(1);
    expect(topology.segments[0].lanes).toHaveLength(1);
    expect(topology.junctions).toEqual([{ id: "X", x: 0, y: 0, type: "unknown" }]);
  });

  it("rejects a document without a net element", () => {
    expect(() => parseNetwork("<routes/>")).toThrow("Network file has no <net> element.");
  });

  it("rejects a junction with non-numeric coordinates", () => {
    expect(() => parseNetwork(`<net><junction id="J" x="abc" y="1"/></net>`)).toThrow(
      "Junction J has invalid coordinates."
    );
  });

  it("rejects a normal edge without endpoints", () => {
    expect(() => parseNetwork(`<net><edge id="E9" from="J0"/></net>`)).toThrow(
      "Edge E9 is missing from/to junctions."
    );
  });

  it("rejects a malformed lane shape", () => {
    expect(() =>
      parseNetwork(`<net><edge id="E" from="A" to="B"><lane id="E_0" shape="0,0 oops"/></edge></net>`)
    ).toThrow("Lane E_0 has a malformed shape.");
  });

  it("reports broken XML", () => {
    expect(() => parseNetwork("<net><junction></net>")).toThrow(/^Network file is not valid XML/);
  });
});

describe("parseShape", () => {
  it("ignores the z component", () => {
    expect(parseShape("1,2,3 4,5,6")).toEqual([
      { x: 1, y: 2 },
      { x: 4, y: 5 }
    ]);
  });

  it("returns null for a point without y", () => {
    expect(parseShape("1,2 3")).toBeNull();
  });
});

describe("decodeNetworkFile", () => {
  it("passes plain XML through", () => {
    expect(decodeNetworkFile(strToU8("<net/>"))).toBe("<net/>");
  });

  it("inflates gzip-compressed networks", () => {
    const compressed = gzipSync(strToU8(NETWORK_XML));
    const topology = parseNetwork(decodeNetworkFile(compressed));

    expect(topology.junctions).toHaveLength(3);
  });
});

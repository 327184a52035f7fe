import { describe, expect, it } from "vitest";

import { SnapshotCollector } from "@/converter/debug/collector";
import { buildProfile, resolveSoil } from "@/converter/profile/profile-builder";
import { DEFAULT_SOIL } from "@/shared/constants";
import { ReconciliationError } from "@/shared/errors";
import type { Polygon } from "@/shared/types/geometry";
import type { SoilDefinition } from "@/shared/types/profile";

const FILE = "dike.dxf";
const OPTIONS = { name: "dike", file: FILE };

/** Closed polygon from [x, y] pairs */
function poly(layer: string, coords: Array<[number, number]>, index = 0): Polygon {
  const vertices = coords.map(([x, y]) => ({ x, y }));
  return { layer, index, vertices: [...vertices, vertices[0]] };
}

function captureError(fn: () => unknown): ReconciliationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ReconciliationError) return err;
    throw err;
  }
  throw new Error("expected a ReconciliationError");
}

const CLAY = poly("clay", [
  [0, 0],
  [10, 0],
  [10, 5],
  [0, 5],
]);

const SAND = poly("sand", [
  [0, 5],
  [10, 5],
  [10, 10],
  [0, 10],
]);

function soil(code: string, layers: string[] = []): SoilDefinition {
  return { ...DEFAULT_SOIL, code, name: code, layers };
}

describe("buildProfile", () => {
  it("orders two rectangles sharing an edge top to bottom, clockwise", () => {
    const profile = buildProfile([CLAY, SAND], OPTIONS);
    expect(profile.name).toBe("dike");
    expect(profile.layers.map((l) => l.label)).toEqual(["sand", "clay"]);
    expect(profile.layers[0].points).toEqual([
      { x: 0, y: 5 },
      { x: 0, y: 10 },
      { x: 10, y: 10 },
      { x: 10, y: 5 },
    ]);
    expect(profile.layers[1].points).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 5 },
      { x: 10, y: 5 },
      { x: 10, y: 0 },
    ]);
    expect(profile.soils).toEqual([DEFAULT_SOIL]);
    expect(profile.layers.every((l) => l.soilCode === "ongedefinieerd")).toBe(true);
  });

  it("keeps polygons that are already clockwise as drawn", () => {
    const clockwise = poly("clay", [
      [0, 0],
      [0, 5],
      [10, 5],
      [10, 0],
    ]);
    expect(buildProfile([clockwise], OPTIONS).layers[0].points).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 5 },
      { x: 10, y: 5 },
      { x: 10, y: 0 },
    ]);
  });

  it("orders layers at the same level from left to right and numbers rings of one layer", () => {
    const left = poly("sand", [
      [0, 0],
      [5, 0],
      [5, 5],
      [0, 5],
    ]);
    const right = poly(
      "sand",
      [
        [5, 0],
        [10, 0],
        [10, 5],
        [5, 5],
      ],
      1,
    );
    const top = poly("clay", [
      [0, 5],
      [5, 5],
      [10, 5],
      [10, 10],
      [0, 10],
    ]);
    const profile = buildProfile([right, top, left], OPTIONS);
    expect(profile.layers.map((l) => l.label)).toEqual(["clay", "sand (1)", "sand (2)"]);
  });

  it("assigns configured soils by code or by listed layer, else the default soil", () => {
    const peat = poly("peat", [
      [0, 10],
      [10, 10],
      [10, 12],
      [0, 12],
    ]);
    const soils = [soil("SAND"), soil("veen", ["peat"])];
    const profile = buildProfile([CLAY, SAND, peat], { ...OPTIONS, soils });
    expect(profile.layers.map((l) => [l.label, l.soilCode])).toEqual([
      ["peat", "veen"],
      ["sand", "SAND"],
      ["clay", "ongedefinieerd"],
    ]);
    expect(profile.soils.map((s) => s.code)).toEqual(["veen", "SAND", "ongedefinieerd"]);
  });

  it("rejects adjacent layers whose shared point differs slightly", () => {
    const shifted = poly("sand", [
      [0, 5],
      [10, 5.01],
      [10, 10],
      [0, 10],
    ]);
    const err = captureError(() => buildProfile([CLAY, shifted], OPTIONS));
    expect(err.step).toBe("build");
    expect(err.layers).toEqual(["clay", "sand"]);
    expect(err.markers).toEqual([{ x: 0, y: 5 }]);
    expect(err.message).toBe('Layers "clay", "sand" touch at (0, 5) without sharing their boundary points');
  });

  it("rejects a vertex lying on a neighbour's edge without a matching point", () => {
    const sandWithMidpoint = poly("sand", [
      [0, 5],
      [5, 5],
      [10, 5],
      [10, 10],
      [0, 10],
    ]);
    const err = captureError(() => buildProfile([CLAY, sandWithMidpoint], OPTIONS));
    expect(err.markers).toEqual([{ x: 5, y: 5 }]);
    expect(err.message).toBe(
      'Point (5, 5) of layer "sand" lies on the boundary of layer "clay", which has no point there',
    );
  });

  it("rejects overlapping layers", () => {
    const inner = poly("sand", [
      [2, 2],
      [8, 2],
      [8, 8],
      [2, 8],
    ]);
    const err = captureError(() => buildProfile([CLAY, inner], OPTIONS));
    expect(err.markers).toEqual([{ x: 8, y: 5 }]);
    expect(err.message).toBe('Layers "clay" and "sand" overlap near (8, 5)');
  });

  it("rejects the same polygon drawn on two layers", () => {
    const copy = { ...CLAY, layer: "sand" };
    const err = captureError(() => buildProfile([CLAY, copy], OPTIONS));
    expect(err.message).toBe('Layers "clay" and "sand" overlap near (0, 0)');
  });

  it("rejects a self-intersecting polygon", () => {
    const bowTie = poly("clay", [
      [0, 0],
      [10, 10],
      [10, 0],
      [0, 10],
    ]);
    const err = captureError(() => buildProfile([bowTie], OPTIONS));
    expect(err.markers).toEqual([{ x: 5, y: 5 }]);
    expect(err.message).toBe('Layer "clay" intersects itself at (5, 5)');
  });

  it("rejects layers that share no boundary with the rest", () => {
    const detached = poly("sand", [
      [20, 0],
      [30, 0],
      [30, 5],
      [20, 5],
    ]);
    const err = captureError(() => buildProfile([CLAY, detached], OPTIONS));
    expect(err.layers).toEqual(["sand"]);
    expect(err.message).toBe(
      'The profile falls apart into 2 separate parts; layer(s) "sand" share no boundary points with the rest',
    );
  });

  it("rejects an empty polygon list", () => {
    expect(() => buildProfile([], OPTIONS)).toThrow('No soil layers to build a profile from in "dike.dxf"');
  });

  it("records the polygons and offending points when validation fails", () => {
    const collector = new SnapshotCollector();
    const inner = poly("sand", [
      [2, 2],
      [8, 2],
      [8, 8],
      [2, 8],
    ]);
    expect(() => buildProfile([CLAY, inner], OPTIONS, collector)).toThrow(ReconciliationError);
    const [snapshot] = collector.snapshots;
    expect(snapshot.step).toBe("build");
    expect(snapshot.polygons).toEqual([CLAY, inner]);
    expect(snapshot.markers).toEqual([{ x: 8, y: 5 }]);
    expect(snapshot.note).toBe('Layers "clay" and "sand" overlap near (8, 5)');
  });
});

describe("resolveSoil", () => {
  it("matches codes and listed layers case-insensitively", () => {
    const soils = [soil("Klei"), soil("veen", ["Peat"])];
    expect(resolveSoil("KLEI", soils).code).toBe("Klei");
    expect(resolveSoil("peat", soils).code).toBe("veen");
    expect(resolveSoil("sand", soils)).toBe(DEFAULT_SOIL);
  });
});

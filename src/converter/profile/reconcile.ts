import {
  cross,
  edgeKey,
  locatePoint,
  onSegmentInterior,
  pointKey,
  samePoint,
  segmentsCross,
} from "@/converter/geometry/geometry";
import { ReconciliationError, formatPoint } from "@/shared/errors";
import type { Point2D, Polygon } from "@/shared/types/geometry";

// ── Helpers ─────────────────────────────────────────────────────────────────

function describe(polygon: Polygon, all: readonly Polygon[]): string {
  const siblings = all.filter((p) => p.layer === polygon.layer).length;
  return siblings > 1 ? `"${polygon.layer}" (ring ${polygon.index + 1})` : `"${polygon.layer}"`;
}

function edgesOf(ring: Point2D[]): Array<[Point2D, Point2D]> {
  const edges: Array<[Point2D, Point2D]> = [];
  for (let i = 0; i < ring.length - 1; i++) edges.push([ring[i], ring[i + 1]]);
  return edges;
}

function openVertices(ring: Point2D[]): Point2D[] {
  return ring.slice(0, -1);
}

function intersectionPoint(a: Point2D, b: Point2D, c: Point2D, d: Point2D): Point2D {
  const denominator = (b.x - a.x) * (d.y - c.y) - (b.y - a.y) * (d.x - c.x);
  const t = cross(c, d, a) / denominator;
  return { x: a.x + t * (b.x - a.x), y: a.y + t * (b.y - a.y) };
}

function midpoint(a: Point2D, b: Point2D): Point2D {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

// ── Checks ──────────────────────────────────────────────────────────────────

/** A ring may only touch itself where consecutive edges meet */
export function checkSimple(polygon: Polygon, all: readonly Polygon[], file: string): void {
  const edges = edgesOf(polygon.vertices);
  const n = edges.length;

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const adjacent = j === i + 1 || (i === 0 && j === n - 1);
      if (adjacent) continue;
      const [a, b] = edges[i];
      const [c, d] = edges[j];

      let marker: Point2D | null = null;
      if (segmentsCross(a, b, c, d)) marker = intersectionPoint(a, b, c, d);
      else if (onSegmentInterior(c, a, b) || samePoint(c, a) || samePoint(c, b)) marker = c;
      else if (onSegmentInterior(d, a, b) || samePoint(d, a) || samePoint(d, b)) marker = d;
      else if (onSegmentInterior(a, c, d)) marker = a;
      else if (onSegmentInterior(b, c, d)) marker = b;

      if (marker != null) {
        throw new ReconciliationError(
          file,
          `Layer ${describe(polygon, all)} intersects itself at ${formatPoint(marker)}`,
          { layers: [polygon.layer], markers: [marker] },
        );
      }
    }
  }
}

/**
 * Adjacent layers must meet in shared vertices. A vertex of one polygon lying
 * on the interior of the other's edge means the other layer lacks that point.
 */
export function checkSharedPoints(a: Polygon, b: Polygon, all: readonly Polygon[], file: string): void {
  for (const [owner, other] of [
    [a, b],
    [b, a],
  ] as const) {
    for (const v of openVertices(owner.vertices)) {
      for (const [start, end] of edgesOf(other.vertices)) {
        if (onSegmentInterior(v, start, end)) {
          throw new ReconciliationError(
            file,
            `Point ${formatPoint(v)} of layer ${describe(owner, all)} lies on the boundary of layer ${describe(other, all)}, which has no point there`,
            { layers: [owner.layer, other.layer], markers: [v] },
          );
        }
      }
    }
  }
}

export function checkNoOverlap(a: Polygon, b: Polygon, all: readonly Polygon[], file: string): void {
  const fail = (where: Point2D): never => {
    throw new ReconciliationError(
      file,
      `Layers ${describe(a, all)} and ${describe(b, all)} overlap near ${formatPoint(where)}`,
      { layers: [a.layer, b.layer], markers: [where] },
    );
  };

  for (const [p, q] of edgesOf(a.vertices)) {
    for (const [r, s] of edgesOf(b.vertices)) {
      if (segmentsCross(p, q, r, s)) fail(intersectionPoint(p, q, r, s));
    }
  }

  for (const [owner, other] of [
    [a, b],
    [b, a],
  ] as const) {
    for (const v of openVertices(owner.vertices)) {
      if (locatePoint(v, other.vertices) === "inside") fail(v);
    }
    for (const [start, end] of edgesOf(owner.vertices)) {
      const m = midpoint(start, end);
      if (locatePoint(m, other.vertices) === "inside") fail(m);
    }
  }

  const keysA = new Set(openVertices(a.vertices).map(pointKey));
  const keysB = new Set(openVertices(b.vertices).map(pointKey));
  if (keysA.size === keysB.size && [...keysA].every((k) => keysB.has(k))) {
    fail(a.vertices[0]);
  }
}

/**
 * Edges used by a single polygon form the outline of the cross-section. In a
 * consistent subdivision that outline is one simple closed loop; layers that
 * touch without sharing their boundary points break it apart or pinch it.
 */
export function checkOutline(polygons: readonly Polygon[], file: string): void {
  const edgeUse = new Map<string, { a: Point2D; b: Point2D; owners: Polygon[] }>();
  for (const polygon of polygons) {
    for (const [a, b] of edgesOf(polygon.vertices)) {
      const key = edgeKey(a, b);
      const entry = edgeUse.get(key);
      if (entry) entry.owners.push(polygon);
      else edgeUse.set(key, { a, b, owners: [polygon] });
    }
  }

  const outline = [...edgeUse.values()].filter((e) => e.owners.length === 1);
  const shared3 = [...edgeUse.values()].find((e) => e.owners.length > 2);
  if (shared3) {
    throw new ReconciliationError(
      file,
      `The edge ${formatPoint(shared3.a)}-${formatPoint(shared3.b)} belongs to ${shared3.owners.length} layers (${shared3.owners.map((p) => describe(p, polygons)).join(", ")})`,
      { layers: shared3.owners.map((p) => p.layer), markers: [shared3.a, shared3.b] },
    );
  }

  const byVertex = new Map<string, { point: Point2D; edges: number[] }>();
  outline.forEach((edge, index) => {
    for (const point of [edge.a, edge.b]) {
      const key = pointKey(point);
      const entry = byVertex.get(key);
      if (entry) entry.edges.push(index);
      else byVertex.set(key, { point, edges: [index] });
    }
  });

  const pinched = [...byVertex.values()].filter((v) => v.edges.length !== 2);
  if (pinched.length > 0) {
    const layers = new Set<string>();
    for (const v of pinched) {
      for (const i of v.edges) layers.add(outline[i].owners[0].layer);
    }
    const where = pinched.map((v) => formatPoint(v.point)).join(", ");
    throw new ReconciliationError(
      file,
      `Layers ${[...layers].map((l) => `"${l}"`).join(", ")} touch at ${where} without sharing their boundary points`,
      { layers: [...layers], markers: pinched.map((v) => v.point) },
    );
  }

  // Every outline vertex has degree two, so components are loops
  const visited = new Array<boolean>(outline.length).fill(false);
  const loops: number[][] = [];
  for (let first = 0; first < outline.length; first++) {
    if (visited[first]) continue;
    const loop: number[] = [];
    const stack = [first];
    visited[first] = true;
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      loop.push(current);
      for (const point of [outline[current].a, outline[current].b]) {
        const entry = byVertex.get(pointKey(point));
        for (const next of entry?.edges ?? []) {
          if (!visited[next]) {
            visited[next] = true;
            stack.push(next);
          }
        }
      }
    }
    loops.push(loop);
  }

  if (loops.length > 1) {
    const detached = loops.slice(1).flat();
    const layers = [...new Set(detached.map((i) => outline[i].owners[0].layer))];
    throw new ReconciliationError(
      file,
      `The profile falls apart into ${loops.length} separate parts; layer(s) ${layers.map((l) => `"${l}"`).join(", ")} share no boundary points with the rest`,
      { layers, markers: detached.map((i) => outline[i].a) },
    );
  }
}

import Flatten from "@flatten-js/core";

import type { Point2D } from "@/shared/types/geometry";

// Predicates compare coordinates exactly. Shared boundary points must be drawn
// identically on both layers, so no tolerance is applied anywhere in here.

export function pointKey(p: Point2D): string {
  return `${p.x},${p.y}`;
}

export function samePoint(a: Point2D, b: Point2D): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Undirected edge key, independent of drawing direction */
export function edgeKey(a: Point2D, b: Point2D): string {
  const ka = pointKey(a);
  const kb = pointKey(b);
  return ka < kb ? `${ka}|${kb}` : `${kb}|${ka}`;
}

/** z-component of (a - o) × (b - o); positive when o→a→b turns left */
export function cross(o: Point2D, a: Point2D, b: Point2D): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/** True when p lies on segment a-b, strictly between its endpoints */
export function onSegmentInterior(p: Point2D, a: Point2D, b: Point2D): boolean {
  if (cross(a, b, p) !== 0) return false;
  if (samePoint(p, a) || samePoint(p, b)) return false;
  const dot = (p.x - a.x) * (b.x - a.x) + (p.y - a.y) * (b.y - a.y);
  const lengthSq = (b.x - a.x) ** 2 + (b.y - a.y) ** 2;
  return dot > 0 && dot < lengthSq;
}

export function onSegment(p: Point2D, a: Point2D, b: Point2D): boolean {
  return samePoint(p, a) || samePoint(p, b) || onSegmentInterior(p, a, b);
}

/**
 * True when a-b and c-d cross in a single point interior to both segments.
 * Touching at an endpoint and collinear overlap do not count.
 */
export function segmentsCross(a: Point2D, b: Point2D, c: Point2D, d: Point2D): boolean {
  const d1 = cross(c, d, a);
  const d2 = cross(c, d, b);
  const d3 = cross(a, b, c);
  const d4 = cross(a, b, d);
  return ((d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)) && ((d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0));
}

/** Shoelace area of a closed ring; positive for counter-clockwise rings */
export function signedArea(ring: Point2D[]): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += ring[i].x * ring[i + 1].y - ring[i + 1].x * ring[i].y;
  }
  return sum / 2;
}

export function isCounterClockwise(ring: Point2D[]): boolean {
  return signedArea(ring) > 0;
}

export type PointLocation = "inside" | "outside" | "boundary";

/** Even-odd ray cast with an exact boundary test first */
export function locatePoint(p: Point2D, ring: Point2D[]): PointLocation {
  for (let i = 0; i < ring.length - 1; i++) {
    if (onSegment(p, ring[i], ring[i + 1])) return "boundary";
  }
  let inside = false;
  for (let i = 0; i < ring.length - 1; i++) {
    const a = ring[i];
    const b = ring[i + 1];
    if (a.y > p.y !== b.y > p.y) {
      const xAtY = a.x + ((p.y - a.y) * (b.x - a.x)) / (b.y - a.y);
      if (p.x < xAtY) inside = !inside;
    }
  }
  return inside ? "inside" : "outside";
}

export function toFlattenPolygon(ring: Point2D[]): Flatten.Polygon {
  return new Flatten.Polygon(ring.map((p) => new Flatten.Point(p.x, p.y)));
}

/** Bounding box of any number of point sets, merged with Flatten's box arithmetic */
export function boundsOf(pointSets: Point2D[][]): Flatten.Box {
  let box = new Flatten.Box();
  for (const points of pointSets) {
    for (const p of points) {
      box = box.merge(new Flatten.Box(p.x, p.y, p.x, p.y));
    }
  }
  return box;
}

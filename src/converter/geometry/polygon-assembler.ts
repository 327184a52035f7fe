/**
 * Links each layer's loose segments into closed rings.
 *
 * Two endpoints are the same vertex only when their coordinates are equal.
 * Every vertex of a valid layer is used by exactly two segments; anything
 * else is a gap (one) or a branch (three or more) and fails the layer.
 */
import { NO_DEBUG, type DebugCollector } from "@/converter/debug/collector";
import { edgeKey, pointKey, samePoint, signedArea } from "@/converter/geometry/geometry";
import { AssemblyError, formatPoint } from "@/shared/errors";
import type { Layer, Point2D, Polygon, Segment } from "@/shared/types/geometry";

interface Incidence {
  point: Point2D;
  segments: number[];
}

function compareLowestLeft(a: Point2D, b: Point2D): number {
  return a.x !== b.x ? a.x - b.x : a.y - b.y;
}

/** Rotates an open ring so it starts at its lowest-leftmost vertex, then closes it */
function normalizeStart(open: Point2D[]): Point2D[] {
  let start = 0;
  for (let i = 1; i < open.length; i++) {
    if (compareLowestLeft(open[i], open[start]) < 0) start = i;
  }
  const rotated = [...open.slice(start), ...open.slice(0, start)];
  return [...rotated, rotated[0]];
}

function buildIncidence(segments: readonly Segment[]): Map<string, Incidence> {
  const incidence = new Map<string, Incidence>();
  segments.forEach((segment, index) => {
    for (const point of [segment.start, segment.end]) {
      const key = pointKey(point);
      const entry = incidence.get(key);
      if (entry) entry.segments.push(index);
      else incidence.set(key, { point, segments: [index] });
    }
  });
  return incidence;
}

function validateTopology(layer: Layer, file: string, incidence: Map<string, Incidence>): void {
  const { name, segments } = layer;

  const seen = new Map<string, Segment>();
  for (const segment of segments) {
    if (samePoint(segment.start, segment.end)) {
      throw new AssemblyError(
        file,
        name,
        `Layer "${name}": ${segment.source} has zero length at ${formatPoint(segment.start)}`,
        { markers: [segment.start], segment },
      );
    }
    const key = edgeKey(segment.start, segment.end);
    const earlier = seen.get(key);
    if (earlier) {
      throw new AssemblyError(
        file,
        name,
        `Layer "${name}": ${segment.source} duplicates ${earlier.source} between ${formatPoint(segment.start)} and ${formatPoint(segment.end)}`,
        { markers: [segment.start, segment.end], segment },
      );
    }
    seen.set(key, segment);
  }

  // Walk in drawing order so the reported defect is stable between runs
  for (const segment of segments) {
    for (const point of [segment.start, segment.end]) {
      const entry = incidence.get(pointKey(point));
      if (entry == null) continue;
      if (entry.segments.length === 1) {
        throw new AssemblyError(
          file,
          name,
          `Layer "${name}" is not closed: ${segment.source} ends at ${formatPoint(point)} where no other segment of the layer continues`,
          { markers: [point], segment },
        );
      }
      if (entry.segments.length > 2) {
        const sources = entry.segments.map((i) => segments[i].source).join(", ");
        throw new AssemblyError(
          file,
          name,
          `Layer "${name}" branches at ${formatPoint(point)}: ${entry.segments.length} segments meet there (${sources})`,
          { markers: [point], segment },
        );
      }
    }
  }
}

/** Chains a layer's segments into one closed polygon per connected boundary */
export function assembleLayer(layer: Layer, file: string): Polygon[] {
  const { name, segments } = layer;
  if (segments.length === 0) {
    throw new AssemblyError(file, name, `Layer "${name}" has no segments`, { markers: [] });
  }

  const incidence = buildIncidence(segments);
  validateTopology(layer, file, incidence);

  const used = new Array<boolean>(segments.length).fill(false);
  const rings: Point2D[][] = [];

  for (let first = 0; first < segments.length; first++) {
    if (used[first]) continue;
    used[first] = true;

    const origin = segments[first].start;
    const open: Point2D[] = [origin];
    let current = segments[first].end;
    let via = first;

    while (!samePoint(current, origin)) {
      open.push(current);
      const entry = incidence.get(pointKey(current));
      if (entry == null) break;
      const next = entry.segments[0] === via ? entry.segments[1] : entry.segments[0];
      used[next] = true;
      const segment = segments[next];
      current = samePoint(segment.start, current) ? segment.end : segment.start;
      via = next;
    }

    const ring = normalizeStart(open);
    if (signedArea(ring) === 0) {
      throw new AssemblyError(
        file,
        name,
        `Layer "${name}": the boundary through ${formatPoint(ring[0])} encloses no area`,
        { markers: open, segment: segments[first] },
      );
    }
    rings.push(ring);
  }

  return rings
    .sort((a, b) => compareLowestLeft(a[0], b[0]))
    .map((vertices, index) => ({ layer: name, index, vertices }));
}

/**
 * Assemble every layer in order. On failure the polygons assembled so far and
 * the failing layer's segments are reported to the collector before rethrowing.
 */
export function assemblePolygons(
  layers: readonly Layer[],
  file: string,
  collector: DebugCollector = NO_DEBUG,
): Polygon[] {
  const polygons: Polygon[] = [];

  for (const layer of layers) {
    try {
      polygons.push(...assembleLayer(layer, file));
    } catch (err) {
      if (err instanceof AssemblyError) {
        collector.record({
          step: "assemble",
          segments: layer.segments.map((segment) => ({ layer: layer.name, segment })),
          polygons: [...polygons],
          markers: err.markers,
          highlight: err.segment,
          note: err.message,
        });
      }
      throw err;
    }
  }

  collector.record({ step: "assemble", segments: [], polygons: [...polygons], markers: [] });
  return polygons;
}

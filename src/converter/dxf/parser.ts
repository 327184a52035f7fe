import { readFile } from "fs/promises";

import DxfParser from "dxf-parser";
import { z } from "zod";

import { NO_DEBUG, type DebugCollector } from "@/converter/debug/collector";
import { samePoint } from "@/converter/geometry/geometry";
import { DEFAULT_IGNORED_LAYERS } from "@/shared/constants";
import { ParseError } from "@/shared/errors";
import type { Layer, Point2D, Segment } from "@/shared/types/geometry";

// ── Entity schemas ──────────────────────────────────────────────────────────
// dxf-parser returns loosely typed entities; only the fields read below are validated.

const vertexSchema = z.object({
  x: z.number(),
  y: z.number(),
  bulge: z.number().optional(),
});

const commonFields = {
  layer: z.string().optional(),
  handle: z.union([z.string(), z.number()]).optional(),
};

const lwPolylineSchema = z.object({
  type: z.literal("LWPOLYLINE"),
  ...commonFields,
  /** dxf-parser exposes the "closed" flag (group 70, bit 1) as `shape` */
  shape: z.boolean().optional(),
  vertices: z.array(vertexSchema),
});

const polylineSchema = z.object({
  type: z.literal("POLYLINE"),
  ...commonFields,
  shape: z.boolean().optional(),
  is3dPolyline: z.boolean().optional(),
  isPolyfaceMesh: z.boolean().optional(),
  isPolygonMesh: z.boolean().optional(),
  vertices: z.array(vertexSchema),
});

const lineSchema = z.object({
  type: z.literal("LINE"),
  ...commonFields,
  vertices: z.array(vertexSchema).length(2),
});

const polygonEntitySchema = z.discriminatedUnion("type", [
  lwPolylineSchema,
  polylineSchema,
  lineSchema,
]);

const curvedEntitySchema = z.object({
  type: z.enum(["ARC", "CIRCLE", "ELLIPSE", "SPLINE"]),
  ...commonFields,
});

// ── Public types ────────────────────────────────────────────────────────────

export interface ReaderOptions {
  /** Round every coordinate to this many decimals on read; null keeps them as drawn */
  decimals?: number | null;
  /** Layer names (case-insensitive) whose geometry is not part of the profile */
  ignoreLayers?: string[];
}

export interface ParsedDxf {
  /** Layers in order of first appearance in the ENTITIES section */
  layers: Layer[];
  warnings: string[];
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  // + 0 folds -0 into 0 so rounded points compare and print the same
  return Math.round(value * factor) / factor + 0;
}

function entityLabel(type: string, handle: string | number | undefined): string {
  return handle == null ? type : `${type}#${handle}`;
}

class LayerCollector {
  private readonly byName = new Map<string, Segment[]>();

  constructor(private readonly decimals: number | null) {}

  point(v: { x: number; y: number }): Point2D {
    if (this.decimals == null) return { x: v.x, y: v.y };
    return { x: roundTo(v.x, this.decimals), y: roundTo(v.y, this.decimals) };
  }

  /** Adds one segment per consecutive vertex pair; zero-length pairs are dropped */
  addPath(layer: string, vertices: Point2D[], closed: boolean, source: string): void {
    const path = closed && vertices.length > 2 ? [...vertices, vertices[0]] : vertices;
    for (let i = 0; i < path.length - 1; i++) {
      if (samePoint(path[i], path[i + 1])) continue;
      this.segmentsOf(layer).push({ start: path[i], end: path[i + 1], source });
    }
  }

  layers(): Layer[] {
    return Array.from(this.byName, ([name, segments]) => ({ name, segments }));
  }

  private segmentsOf(layer: string): Segment[] {
    let segments = this.byName.get(layer);
    if (segments == null) {
      segments = [];
      this.byName.set(layer, segments);
    }
    return segments;
  }
}

/** A failed read still leaves a (geometry-free) snapshot carrying the error */
function recordFailure(collector: DebugCollector, err: ParseError): void {
  collector.record({ step: "read", segments: [], polygons: [], markers: [], note: err.message });
}

function readLayers(content: string, file: string, options: ReaderOptions): ParsedDxf {
  if (content.trim().length === 0) {
    throw new ParseError(file, `Cannot read "${file}": the file is empty`);
  }

  let dxf: ReturnType<DxfParser["parseSync"]>;
  try {
    dxf = new DxfParser().parseSync(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(file, `Cannot read "${file}" as DXF: ${reason}`, { cause: err });
  }
  if (dxf == null || dxf.entities == null) {
    throw new ParseError(file, `Invalid DXF file "${file}": missing entity data`);
  }

  const ignored = new Set((options.ignoreLayers ?? DEFAULT_IGNORED_LAYERS).map((l) => l.toLowerCase()));
  const collected = new LayerCollector(options.decimals ?? null);
  const warnings: string[] = [];

  for (const raw of dxf.entities) {
    const curved = curvedEntitySchema.safeParse(raw);
    if (curved.success) {
      const layer = curved.data.layer ?? "0";
      if (!ignored.has(layer.toLowerCase())) {
        warnings.push(
          `Layer "${layer}": ${entityLabel(curved.data.type, curved.data.handle)} is curved and was skipped; draw soil boundaries as polylines`,
        );
      }
      continue;
    }

    const parsed = polygonEntitySchema.safeParse(raw);
    if (!parsed.success) continue; // text, dimensions, inserts: no boundary geometry

    const e = parsed.data;
    const layer = e.layer ?? "0";
    if (ignored.has(layer.toLowerCase())) continue;
    const source = entityLabel(e.type, e.handle);

    if (e.type === "LINE") {
      collected.addPath(layer, e.vertices.map((v) => collected.point(v)), false, source);
      continue;
    }

    if (e.type === "POLYLINE" && (e.is3dPolyline === true || e.isPolyfaceMesh === true || e.isPolygonMesh === true)) {
      warnings.push(`Layer "${layer}": ${source} is a 3D polyline or mesh and was skipped`);
      continue;
    }
    if (e.vertices.length < 2) {
      warnings.push(`Layer "${layer}": ${source} has fewer than two vertices and was skipped`);
      continue;
    }
    if (e.vertices.some((v) => v.bulge != null && v.bulge !== 0)) {
      warnings.push(`Layer "${layer}": ${source} has curved segments (bulge); they are read as straight edges`);
    }
    collected.addPath(layer, e.vertices.map((v) => collected.point(v)), e.shape === true, source);
  }

  const layers = collected.layers();
  if (layers.length === 0) {
    throw new ParseError(
      file,
      `No polygon geometry found in "${file}": expected LWPOLYLINE, POLYLINE or LINE entities on named layers`,
    );
  }

  return { layers, warnings };
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Parse DXF content into per-layer boundary segments.
 * LWPOLYLINE, 2D POLYLINE and LINE entities are read; bulges are read as
 * straight edges and reported in `warnings`, as are curved entities.
 */
export function parseDxfContent(
  content: string,
  file: string,
  options: ReaderOptions = {},
  collector: DebugCollector = NO_DEBUG,
): ParsedDxf {
  let parsed: ParsedDxf;
  try {
    parsed = readLayers(content, file, options);
  } catch (err) {
    if (err instanceof ParseError) recordFailure(collector, err);
    throw err;
  }

  collector.record({
    step: "read",
    segments: parsed.layers.flatMap((l) => l.segments.map((segment) => ({ layer: l.name, segment }))),
    polygons: [],
    markers: [],
  });
  return parsed;
}

export async function readDxfFile(
  file: string,
  options: ReaderOptions = {},
  collector: DebugCollector = NO_DEBUG,
): Promise<ParsedDxf> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const failure = new ParseError(file, `Cannot read "${file}": ${reason}`, { cause: err });
    recordFailure(collector, failure);
    throw failure;
  }
  return parseDxfContent(content, file, options, collector);
}

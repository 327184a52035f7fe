import { NO_DEBUG, type DebugCollector } from "@/converter/debug/collector";
import { isCounterClockwise, toFlattenPolygon } from "@/converter/geometry/geometry";
import { checkNoOverlap, checkOutline, checkSharedPoints, checkSimple } from "@/converter/profile/reconcile";
import { DEFAULT_SOIL } from "@/shared/constants";
import { ReconciliationError } from "@/shared/errors";
import type { Point2D, Polygon } from "@/shared/types/geometry";
import type { ProfileLayer, SoilDefinition, SoilProfile } from "@/shared/types/profile";

export interface BuildOptions {
  /** Project name written to the model, usually the input file's stem */
  name: string;
  file: string;
  soils?: SoilDefinition[];
}

/** Soil whose code equals the layer name, or that lists the layer; otherwise the default soil */
export function resolveSoil(layer: string, soils: readonly SoilDefinition[]): SoilDefinition {
  const key = layer.toLowerCase();
  return (
    soils.find(
      (s) => s.code.toLowerCase() === key || s.layers.some((l) => l.toLowerCase() === key),
    ) ?? DEFAULT_SOIL
  );
}

/** Clockwise open ring, keeping the start vertex */
function clockwisePoints(vertices: Point2D[]): Point2D[] {
  const open = vertices.slice(0, -1);
  if (!isCounterClockwise(vertices)) return open;
  return [open[0], ...open.slice(1).reverse()];
}

interface Ranked {
  polygon: Polygon;
  top: number;
  bottom: number;
  left: number;
}

/** Top to bottom: highest top first, then highest bottom, then leftmost, then name */
function compareStratigraphic(a: Ranked, b: Ranked): number {
  if (a.top !== b.top) return b.top - a.top;
  if (a.bottom !== b.bottom) return b.bottom - a.bottom;
  if (a.left !== b.left) return a.left - b.left;
  const byName = a.polygon.layer.localeCompare(b.polygon.layer);
  return byName !== 0 ? byName : a.polygon.index - b.polygon.index;
}

function validate(polygons: readonly Polygon[], file: string): void {
  for (const polygon of polygons) checkSimple(polygon, polygons, file);
  for (let i = 0; i < polygons.length; i++) {
    for (let j = i + 1; j < polygons.length; j++) {
      checkSharedPoints(polygons[i], polygons[j], polygons, file);
      checkNoOverlap(polygons[i], polygons[j], polygons, file);
    }
  }
  checkOutline(polygons, file);
}

/**
 * Validate the assembled polygons as one non-overlapping subdivision and order
 * them into the stratigraphic stack written to the model.
 */
export function buildProfile(
  polygons: readonly Polygon[],
  options: BuildOptions,
  collector: DebugCollector = NO_DEBUG,
): SoilProfile {
  const { file, name } = options;

  try {
    if (polygons.length === 0) {
      throw new ReconciliationError(file, `No soil layers to build a profile from in "${file}"`, {
        layers: [],
        markers: [],
      });
    }
    validate(polygons, file);
  } catch (err) {
    if (err instanceof ReconciliationError) {
      collector.record({
        step: "build",
        segments: [],
        polygons: [...polygons],
        markers: err.markers,
        note: err.message,
      });
    }
    throw err;
  }

  const ranked: Ranked[] = polygons.map((polygon) => {
    const { box } = toFlattenPolygon(polygon.vertices);
    return { polygon, top: box.ymax, bottom: box.ymin, left: box.xmin };
  });
  ranked.sort(compareStratigraphic);

  const ringsPerLayer = new Map<string, number>();
  for (const polygon of polygons) {
    ringsPerLayer.set(polygon.layer, (ringsPerLayer.get(polygon.layer) ?? 0) + 1);
  }

  const configured = options.soils ?? [];
  const soils: SoilDefinition[] = [];
  const layers: ProfileLayer[] = ranked.map(({ polygon }) => {
    const soil = resolveSoil(polygon.layer, configured);
    if (!soils.some((s) => s.code === soil.code)) soils.push(soil);
    const multiple = (ringsPerLayer.get(polygon.layer) ?? 0) > 1;
    return {
      label: multiple ? `${polygon.layer} (${polygon.index + 1})` : polygon.layer,
      layer: polygon.layer,
      polygon,
      points: clockwisePoints(polygon.vertices),
      soilCode: soil.code,
    };
  });

  collector.record({ step: "build", segments: [], polygons: [...polygons], markers: [] });

  return { name, layers, soils };
}

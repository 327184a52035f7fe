import type { ConversionStep } from "@/shared/errors";
import type { Point2D, Polygon, Segment } from "@/shared/types/geometry";

/** Geometry a pipeline stage held when it finished or failed */
export interface DebugSnapshot {
  step: ConversionStep;
  /** Raw segments, tagged with the layer they were drawn on */
  segments: Array<{ layer: string; segment: Segment }>;
  polygons: Polygon[];
  /** Offending points, drawn in red */
  markers: Point2D[];
  /** Offending segment, drawn in red */
  highlight?: Segment;
  /** Error message printed on the image */
  note?: string;
}

/**
 * Side channel for diagnostic state. Stages report to it and carry on; it
 * never influences the outcome of a conversion.
 */
export interface DebugCollector {
  record(snapshot: DebugSnapshot): void;
}

export const NO_DEBUG: DebugCollector = {
  record() {},
};

/** Keeps the latest snapshot per step, in step order of arrival */
export class SnapshotCollector implements DebugCollector {
  private readonly byStep = new Map<ConversionStep, DebugSnapshot>();

  record(snapshot: DebugSnapshot): void {
    this.byStep.set(snapshot.step, snapshot);
  }

  get snapshots(): DebugSnapshot[] {
    return Array.from(this.byStep.values());
  }
}

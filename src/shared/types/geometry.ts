// ── Geometry shared across the conversion pipeline ───────────────────────────
// Coordinates are DXF drawing units. The DXF y axis becomes DStability's Z.

export interface Point2D {
  x: number;
  y: number;
}

export interface Segment {
  start: Point2D;
  end: Point2D;
  /** DXF entity the segment was read from, e.g. "LWPOLYLINE#2A" */
  source: string;
}

/** A named DXF layer and the raw segments drawn on it */
export interface Layer {
  readonly name: string;
  readonly segments: readonly Segment[];
}

/**
 * A closed ring assembled from one connected boundary of a layer.
 * `vertices` repeats the first vertex as the last one.
 */
export interface Polygon {
  layer: string;
  /** 0-based index of this ring within its layer */
  index: number;
  vertices: Point2D[];
}

import type { CONVERSION_STEPS } from "@/shared/constants";
import type { Point2D, Segment } from "@/shared/types/geometry";

export type ConversionStep = (typeof CONVERSION_STEPS)[number];

/** Base class for every failure of a per-file conversion */
export class ConversionError extends Error {
  readonly step: ConversionStep;
  readonly file: string;

  constructor(step: ConversionStep, file: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
    this.step = step;
    this.file = file;
  }
}

/** The DXF file is unreadable, not a DXF, or holds no polygon geometry */
export class ParseError extends ConversionError {
  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super("read", file, message, options);
    this.name = "ParseError";
  }
}

/** Geometry errors point at the offending location so the debug renderer can mark it */
export interface GeometryErrorContext {
  layers: string[];
  markers: Point2D[];
  segment?: Segment;
}

/** A layer's segments cannot be chained into closed rings */
export class AssemblyError extends ConversionError {
  readonly layer: string;
  readonly markers: Point2D[];
  readonly segment?: Segment;

  constructor(file: string, layer: string, message: string, context: Omit<GeometryErrorContext, "layers">) {
    super("assemble", file, message);
    this.name = "AssemblyError";
    this.layer = layer;
    this.markers = context.markers;
    this.segment = context.segment;
  }
}

/** Assembled polygons do not form a valid non-overlapping subdivision */
export class ReconciliationError extends ConversionError {
  readonly layers: string[];
  readonly markers: Point2D[];

  constructor(file: string, message: string, context: Omit<GeometryErrorContext, "segment">) {
    super("build", file, message);
    this.name = "ReconciliationError";
    this.layers = context.layers;
    this.markers = context.markers;
  }
}

/** The STIX output could not be written */
export class IOError extends ConversionError {
  readonly path: string;

  constructor(file: string, path: string, message: string, options?: { cause?: unknown }) {
    super("write", file, message, options);
    this.name = "IOError";
    this.path = path;
  }
}

/** Invalid CLI flags, environment values or soil definitions */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function formatPoint(p: Point2D): string {
  return `(${p.x}, ${p.y})`;
}

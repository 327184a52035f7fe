// Single source of truth for file conventions and defaults shared by the CLI and the pipeline.

import type { SoilDefinition } from "@/shared/types/profile";

export const DXF_EXTENSION = ".dxf";
export const STIX_EXTENSION = ".stix";

export const DEFAULT_INPUT_DIR = "./data";

/** Layers AutoCAD creates for non-plotting helper geometry */
export const DEFAULT_IGNORED_LAYERS = ["Defpoints"];

/** Soil assigned to every layer that has no configured soil of its own */
export const DEFAULT_SOIL: SoilDefinition = {
  code: "ongedefinieerd",
  name: "ongedefinieerd",
  layers: [],
  unsaturatedWeight: 14.0,
  saturatedWeight: 14.0,
  cohesion: 2.0,
  frictionAngle: 22.0,
  dilatancy: 0.0,
  color: "#A0A0A0",
};

/** Pipeline steps in execution order; debug images are numbered after this list. */
export const CONVERSION_STEPS = ["read", "assemble", "build", "write"] as const;

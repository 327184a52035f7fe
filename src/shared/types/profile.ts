import type { Point2D, Polygon } from "./geometry";

/** Soil parameters as written to soils.json */
export interface SoilDefinition {
  code: string;
  name: string;
  /** Layer names mapped onto this soil besides the one equal to `code` */
  layers: string[];
  unsaturatedWeight: number; // kN/m³
  saturatedWeight: number; // kN/m³
  cohesion: number; // kPa
  frictionAngle: number; // degrees
  dilatancy: number; // degrees
  /** #RRGGBB used by DStability to paint the layer */
  color: string;
}

/** One stratum of the cross-section, in stratigraphic order */
export interface ProfileLayer {
  label: string;
  layer: string;
  polygon: Polygon;
  /** Clockwise, without the closing duplicate */
  points: Point2D[];
  soilCode: string;
}

export interface SoilProfile {
  /** Project name, the input file's stem */
  name: string;
  layers: ProfileLayer[];
  /** Soils referenced by at least one layer, in first-use order */
  soils: SoilDefinition[];
}

// ── DStability documents stored inside a .stix archive ──────────────────────
// Property names follow the DStability JSON schema (PascalCase).

export const STIX_CONTENT_VERSION = "2";

export interface StixPoint {
  X: number;
  Z: number;
}

export interface StixProjectInfo {
  ContentVersion: string;
  Project: string;
  CrossSection: string;
  Analyst: string;
  Remarks: string;
  Path: string;
  Created: string;
  Date: string;
  LastModified: string;
  LastModifier: string;
  ApplicationCreated: string;
  ApplicationModified: string;
  IsDataValidated: boolean;
}

export interface StixSoil {
  Id: string;
  Code: string;
  Name: string;
  Notes: string;
  IsProbabilistic: boolean;
  VolumetricWeightAbovePhreaticLevel: number;
  VolumetricWeightBelowPhreaticLevel: number;
  ShearStrengthModelTypeAbovePhreaticLevel: "MohrCoulombAdvanced";
  ShearStrengthModelTypeBelowPhreaticLevel: "MohrCoulombAdvanced";
  MohrCoulombAdvancedShearStrengthModel: {
    Cohesion: number;
    FrictionAngle: number;
    Dilatancy: number;
  };
}

export interface StixSoils {
  ContentVersion: string;
  Soils: StixSoil[];
}

export interface StixSoilVisualizations {
  ContentVersion: string;
  SoilVisualizations: Array<{
    SoilId: string;
    Color: string;
    PersistableShadingType: "None";
  }>;
}

export interface StixGeometryLayer {
  Id: string;
  Label: string;
  Notes: string;
  Points: StixPoint[];
}

export interface StixGeometry {
  ContentVersion: string;
  Id: string;
  Layers: StixGeometryLayer[];
}

export interface StixSoilLayers {
  ContentVersion: string;
  Id: string;
  SoilLayers: Array<{ LayerId: string; SoilId: string }>;
}

export interface StixWaternet {
  ContentVersion: string;
  Id: string;
  PhreaticLineId: string | null;
  UnitWeightWater: number;
  HeadLines: never[];
  ReferenceLines: never[];
}

/** Inputs of DStability's waternet generator; left at their defaults */
export interface StixWaternetCreatorSettings {
  ContentVersion: string;
  Id: string;
  AdjustForUplift: boolean;
  AquiferLayerId: string | null;
  AquiferInsideAquitardLayerId: string | null;
  AquitardHeadLandSide: number | null;
  AquitardHeadWaterSide: number | null;
  DitchCharacteristics: {
    DitchBottomEmbankmentSide: number | null;
    DitchBottomLandSide: number | null;
    DitchEmbankmentSide: number | null;
    DitchLandSide: number | null;
  };
  DrainageConstruction: { X: number | null; Z: number | null };
  EmbankmentCharacteristics: {
    EmbankmentToeLandSide: number | null;
    EmbankmentToeWaterSide: number | null;
    EmbankmentTopLandSide: number | null;
    EmbankmentTopWaterSide: number | null;
    ShoulderBaseLandSide: number | null;
  };
  EmbankmentSoilScenario: "ClayEmbankmentOnClay";
  InitialLevelEmbankmentTopLandSide: number | null;
  InitialLevelEmbankmentTopWaterSide: number | null;
  IntrusionLength: number | null;
  IsAquiferLayerInsideAquitard: boolean;
  IsDitchPresent: boolean;
  IsDrainageConstructionPresent: boolean;
  MeanWaterLevel: number | null;
  NormativeWaterLevel: number | null;
  OffsetEmbankmentToeLandSide: number | null;
  OffsetEmbankmentTopLandSide: number | null;
  OffsetEmbankmentTopWaterSide: number | null;
  OffsetShoulderBaseLandSide: number | null;
  PleistoceneLeakageLengthInwards: number | null;
  PleistoceneLeakageLengthOutwards: number | null;
  UseDefaultOffsets: boolean;
  WaterLevelHinterland: number | null;
}

export interface StixState {
  ContentVersion: string;
  Id: string;
  StateLines: never[];
  StatePoints: never[];
}

export interface StixStateCorrelations {
  ContentVersion: string;
  Id: string;
  StateCorrelations: never[];
}

export interface StixLoads {
  ContentVersion: string;
  Id: string;
  Earthquake: {
    FreeWaterFactor: number;
    HorizontalFactor: number;
    IsEnabled: boolean;
    VerticalFactor: number;
  };
  LayerLoads: never[];
  LineLoads: never[];
  Trees: never[];
  UniformLoads: never[];
}

export interface StixReinforcements {
  ContentVersion: string;
  Id: string;
  ForbiddenLines: never[];
  Geotextiles: never[];
  Nails: never[];
}

export interface StixDecorations {
  ContentVersion: string;
  Id: string;
  Elevations: never[];
  Excavations: never[];
}

export interface StixSoilCorrelations {
  ContentVersion: string;
  SoilCorrelations: never[];
}

export interface StixNailPropertiesForSoils {
  ContentVersion: string;
  NailPropertiesForSoils: never[];
}

export interface StixCalculationSettings {
  ContentVersion: string;
  Id: string;
  AnalysisType: "Bishop";
  CalculationType: "Deterministic";
  ModelFactorMean: number;
  ModelFactorStandardDeviation: number;
}

export interface StixScenario {
  ContentVersion: string;
  Id: string;
  Label: string;
  Notes: string;
  Stages: Array<{
    Id: string;
    Label: string;
    Notes: string;
    GeometryId: string;
    SoilLayersId: string;
    WaternetId: string;
    WaternetCreatorSettingsId: string;
    StateId: string;
    StateCorrelationsId: string;
    LoadsId: string;
    ReinforcementsId: string;
    DecorationsId: string;
  }>;
  Calculations: Array<{
    Id: string;
    Label: string;
    Notes: string;
    CalculationSettingsId: string;
    /** Set by DStability once the calculation has run */
    ResultId: string | null;
  }>;
}

/** Archive entry name → document */
export interface StixDocuments {
  "projectinfo.json": StixProjectInfo;
  "soils.json": StixSoils;
  "soilvisualizations.json": StixSoilVisualizations;
  "soilcorrelations.json": StixSoilCorrelations;
  "nailpropertiesforsoils.json": StixNailPropertiesForSoils;
  "geometries/geometry.json": StixGeometry;
  "soillayers/soillayers.json": StixSoilLayers;
  "waternets/waternet.json": StixWaternet;
  "waternetcreatorsettings/waternetcreatorsettings.json": StixWaternetCreatorSettings;
  "states/state.json": StixState;
  "statecorrelations/statecorrelations.json": StixStateCorrelations;
  "loads/loads.json": StixLoads;
  "reinforcements/reinforcements.json": StixReinforcements;
  "decorations/decorations.json": StixDecorations;
  "calculationsettings/calculationsettings.json": StixCalculationSettings;
  "scenarios/scenario.json": StixScenario;
}

import { rename, rm, writeFile } from "fs/promises";
import path from "path";

import JSZip from "jszip";

import { STIX_EXTENSION } from "@/shared/constants";
import { IOError } from "@/shared/errors";
import type { SoilProfile } from "@/shared/types/profile";
import { STIX_CONTENT_VERSION, type StixDocuments } from "@/shared/types/stix";

/** Entry timestamp inside the archive; fixed so equal input gives equal bytes */
const ARCHIVE_DATE = new Date(2000, 0, 1, 0, 0, 0);

/** Creation and modification date written to projectinfo.json */
const MODEL_DATE = "2000-01-01T00:00:00";

const APPLICATION = "dxf2stix";

const UNIT_WEIGHT_WATER = 9.81; // kN/m³

/** `<dir>/<stem>.stix` next to the input file */
export function stixPathFor(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}${STIX_EXTENSION}`);
}

/** DStability stores colours as #AARRGGBB */
function toArgb(color: string): string {
  return `#FF${color.slice(1).toUpperCase()}`;
}

/** Sequential ids, the way DStability numbers the objects of a fresh model */
function idAllocator(): () => string {
  let next = 1;
  return () => String(next++);
}

export function buildStixDocuments(profile: SoilProfile, sourceFile?: string): StixDocuments {
  const nextId = idAllocator();

  const soilIds = new Map<string, string>();
  for (const soil of profile.soils) soilIds.set(soil.code, nextId());

  const geometryId = nextId();
  const geometryLayers = profile.layers.map((layer) => ({
    Id: nextId(),
    Label: layer.label,
    Notes: "",
    Points: layer.points.map((p) => ({ X: p.x, Z: p.y })),
  }));

  const soilLayersId = nextId();
  const waternetId = nextId();
  const waternetCreatorSettingsId = nextId();
  const stateId = nextId();
  const stateCorrelationsId = nextId();
  const loadsId = nextId();
  const reinforcementsId = nextId();
  const decorationsId = nextId();
  const calculationSettingsId = nextId();
  const scenarioId = nextId();
  const stageId = nextId();
  const calculationId = nextId();

  const soilIdOf = (code: string): string => {
    const id = soilIds.get(code);
    if (id == null) throw new Error(`Soil "${code}" is used by a layer but missing from the profile`);
    return id;
  };

  return {
    "projectinfo.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Project: profile.name,
      CrossSection: profile.name,
      Analyst: "",
      Remarks: sourceFile ? `Converted from ${path.basename(sourceFile)}` : "",
      Path: "",
      Created: MODEL_DATE,
      Date: MODEL_DATE,
      LastModified: MODEL_DATE,
      LastModifier: APPLICATION,
      ApplicationCreated: APPLICATION,
      ApplicationModified: APPLICATION,
      IsDataValidated: false,
    },
    "soils.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Soils: profile.soils.map((soil) => ({
        Id: soilIdOf(soil.code),
        Code: soil.code,
        Name: soil.name,
        Notes: "",
        IsProbabilistic: false,
        VolumetricWeightAbovePhreaticLevel: soil.unsaturatedWeight,
        VolumetricWeightBelowPhreaticLevel: soil.saturatedWeight,
        ShearStrengthModelTypeAbovePhreaticLevel: "MohrCoulombAdvanced",
        ShearStrengthModelTypeBelowPhreaticLevel: "MohrCoulombAdvanced",
        MohrCoulombAdvancedShearStrengthModel: {
          Cohesion: soil.cohesion,
          FrictionAngle: soil.frictionAngle,
          Dilatancy: soil.dilatancy,
        },
      })),
    },
    "soilvisualizations.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      SoilVisualizations: profile.soils.map((soil) => ({
        SoilId: soilIdOf(soil.code),
        Color: toArgb(soil.color),
        PersistableShadingType: "None",
      })),
    },
    "soilcorrelations.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      SoilCorrelations: [],
    },
    "nailpropertiesforsoils.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      NailPropertiesForSoils: [],
    },
    "geometries/geometry.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: geometryId,
      Layers: geometryLayers,
    },
    "soillayers/soillayers.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: soilLayersId,
      SoilLayers: profile.layers.map((layer, i) => ({
        LayerId: geometryLayers[i].Id,
        SoilId: soilIdOf(layer.soilCode),
      })),
    },
    "waternets/waternet.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: waternetId,
      PhreaticLineId: null,
      UnitWeightWater: UNIT_WEIGHT_WATER,
      HeadLines: [],
      ReferenceLines: [],
    },
    "waternetcreatorsettings/waternetcreatorsettings.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: waternetCreatorSettingsId,
      AdjustForUplift: false,
      AquiferLayerId: null,
      AquiferInsideAquitardLayerId: null,
      AquitardHeadLandSide: null,
      AquitardHeadWaterSide: null,
      DitchCharacteristics: {
        DitchBottomEmbankmentSide: null,
        DitchBottomLandSide: null,
        DitchEmbankmentSide: null,
        DitchLandSide: null,
      },
      DrainageConstruction: { X: null, Z: null },
      EmbankmentCharacteristics: {
        EmbankmentToeLandSide: null,
        EmbankmentToeWaterSide: null,
        EmbankmentTopLandSide: null,
        EmbankmentTopWaterSide: null,
        ShoulderBaseLandSide: null,
      },
      EmbankmentSoilScenario: "ClayEmbankmentOnClay",
      InitialLevelEmbankmentTopLandSide: null,
      InitialLevelEmbankmentTopWaterSide: null,
      IntrusionLength: null,
      IsAquiferLayerInsideAquitard: false,
      IsDitchPresent: false,
      IsDrainageConstructionPresent: false,
      MeanWaterLevel: null,
      NormativeWaterLevel: null,
      OffsetEmbankmentToeLandSide: null,
      OffsetEmbankmentTopLandSide: null,
      OffsetEmbankmentTopWaterSide: null,
      OffsetShoulderBaseLandSide: null,
      PleistoceneLeakageLengthInwards: null,
      PleistoceneLeakageLengthOutwards: null,
      UseDefaultOffsets: true,
      WaterLevelHinterland: null,
    },
    "states/state.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: stateId,
      StateLines: [],
      StatePoints: [],
    },
    "statecorrelations/statecorrelations.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: stateCorrelationsId,
      StateCorrelations: [],
    },
    "loads/loads.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: loadsId,
      Earthquake: { FreeWaterFactor: 0, HorizontalFactor: 0, IsEnabled: false, VerticalFactor: 0 },
      LayerLoads: [],
      LineLoads: [],
      Trees: [],
      UniformLoads: [],
    },
    "reinforcements/reinforcements.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: reinforcementsId,
      ForbiddenLines: [],
      Geotextiles: [],
      Nails: [],
    },
    "decorations/decorations.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: decorationsId,
      Elevations: [],
      Excavations: [],
    },
    "calculationsettings/calculationsettings.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: calculationSettingsId,
      AnalysisType: "Bishop",
      CalculationType: "Deterministic",
      ModelFactorMean: 1.0,
      ModelFactorStandardDeviation: 0.05,
    },
    "scenarios/scenario.json": {
      ContentVersion: STIX_CONTENT_VERSION,
      Id: scenarioId,
      Label: "Scenario 1",
      Notes: "",
      Stages: [
        {
          Id: stageId,
          Label: "Stage 1",
          Notes: "",
          GeometryId: geometryId,
          SoilLayersId: soilLayersId,
          WaternetId: waternetId,
          WaternetCreatorSettingsId: waternetCreatorSettingsId,
          StateId: stateId,
          StateCorrelationsId: stateCorrelationsId,
          LoadsId: loadsId,
          ReinforcementsId: reinforcementsId,
          DecorationsId: decorationsId,
        },
      ],
      Calculations: [
        {
          Id: calculationId,
          Label: "Calculation 1",
          Notes: "",
          CalculationSettingsId: calculationSettingsId,
          ResultId: null,
        },
      ],
    },
  };
}

/** Zip the DStability documents into .stix bytes */
export async function serializeStix(profile: SoilProfile, sourceFile?: string): Promise<Buffer> {
  const zip = new JSZip();
  for (const [entry, document] of Object.entries(buildStixDocuments(profile, sourceFile))) {
    zip.file(entry, JSON.stringify(document, null, 2), {
      date: ARCHIVE_DATE,
      // implicit folder entries would carry the current time
      createFolders: false,
    });
  }
  return zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    compressionOptions: { level: 6 },
  });
}

/**
 * Serialize and write the profile; performs no corrective logic on the geometry.
 * The archive is written beside the target and renamed into place, so the
 * target is either the complete new file or untouched.
 */
export async function writeStixFile(profile: SoilProfile, outputPath: string, sourceFile: string): Promise<void> {
  const bytes = await serializeStix(profile, sourceFile);
  const partial = `${outputPath}.${process.pid}.tmp`;
  try {
    await writeFile(partial, bytes);
    await rename(partial, outputPath);
  } catch (err) {
    await rm(partial, { force: true });
    const reason = err instanceof Error ? err.message : String(err);
    throw new IOError(sourceFile, outputPath, `Cannot write "${outputPath}": ${reason}`, { cause: err });
  }
}

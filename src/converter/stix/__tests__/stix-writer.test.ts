import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";

import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildStixDocuments, serializeStix, stixPathFor, writeStixFile } from "@/converter/stix/stix-writer";
import { DEFAULT_SOIL } from "@/shared/constants";
import { IOError } from "@/shared/errors";
import type { SoilProfile } from "@/shared/types/profile";

function closed(coords: Array<[number, number]>) {
  const vertices = coords.map(([x, y]) => ({ x, y }));
  return [...vertices, vertices[0]];
}

const PROFILE: SoilProfile = {
  name: "dike",
  soils: [DEFAULT_SOIL],
  layers: [
    {
      label: "sand",
      layer: "sand",
      polygon: { layer: "sand", index: 0, vertices: closed([[0, 5], [10, 5], [10, 10], [0, 10]]) },
      points: [
        { x: 0, y: 5 },
        { x: 0, y: 10 },
        { x: 10, y: 10 },
        { x: 10, y: 5 },
      ],
      soilCode: "ongedefinieerd",
    },
    {
      label: "clay",
      layer: "clay",
      polygon: { layer: "clay", index: 0, vertices: closed([[0, 0], [10, 0], [10, 5], [0, 5]]) },
      points: [
        { x: 0, y: 0 },
        { x: 0, y: 5 },
        { x: 10, y: 5 },
        { x: 10, y: 0 },
      ],
      soilCode: "ongedefinieerd",
    },
  ],
};

describe("stixPathFor", () => {
  it("replaces the extension next to the input", () => {
    expect(stixPathFor("/data/sections/dike.DXF")).toBe("/data/sections/dike.stix");
  });
});

describe("buildStixDocuments", () => {
  const docs = buildStixDocuments(PROFILE, "/data/dike.dxf");

  it("lists every layer with its own points, shared points repeated exactly", () => {
    const geometry = docs["geometries/geometry.json"];
    expect(geometry.Id).toBe("2");
    expect(geometry.Layers.map((l) => [l.Id, l.Label])).toEqual([
      ["3", "sand"],
      ["4", "clay"],
    ]);
    expect(geometry.Layers[0].Points).toEqual([
      { X: 0, Z: 5 },
      { X: 0, Z: 10 },
      { X: 10, Z: 10 },
      { X: 10, Z: 5 },
    ]);
    expect(geometry.Layers[1].Points).toContainEqual({ X: 0, Z: 5 });
    expect(geometry.Layers[1].Points).toContainEqual({ X: 10, Z: 5 });
  });

  it("writes the default soil with its Mohr-Coulomb parameters", () => {
    expect(docs["soils.json"].Soils).toEqual([
      {
        Id: "1",
        Code: "ongedefinieerd",
        Name: "ongedefinieerd",
        Notes: "",
        IsProbabilistic: false,
        VolumetricWeightAbovePhreaticLevel: 14,
        VolumetricWeightBelowPhreaticLevel: 14,
        ShearStrengthModelTypeAbovePhreaticLevel: "MohrCoulombAdvanced",
        ShearStrengthModelTypeBelowPhreaticLevel: "MohrCoulombAdvanced",
        MohrCoulombAdvancedShearStrengthModel: { Cohesion: 2, FrictionAngle: 22, Dilatancy: 0 },
      },
    ]);
    expect(docs["soilvisualizations.json"].SoilVisualizations).toEqual([
      { SoilId: "1", Color: "#FFA0A0A0", PersistableShadingType: "None" },
    ]);
  });

  it("links layers to soils and the stage to its documents", () => {
    expect(docs["soillayers/soillayers.json"]).toEqual({
      ContentVersion: "2",
      Id: "5",
      SoilLayers: [
        { LayerId: "3", SoilId: "1" },
        { LayerId: "4", SoilId: "1" },
      ],
    });
    const [stage] = docs["scenarios/scenario.json"].Stages;
    expect(stage).toEqual({
      Id: "15",
      Label: "Stage 1",
      Notes: "",
      GeometryId: "2",
      SoilLayersId: "5",
      WaternetId: "6",
      WaternetCreatorSettingsId: "7",
      StateId: "8",
      StateCorrelationsId: "9",
      LoadsId: "10",
      ReinforcementsId: "11",
      DecorationsId: "12",
    });
    expect(docs["scenarios/scenario.json"].Calculations).toEqual([
      { Id: "16", Label: "Calculation 1", Notes: "", CalculationSettingsId: "13", ResultId: null },
    ]);
  });

  it("names the project after the profile and the source file", () => {
    expect(docs["projectinfo.json"].Project).toBe("dike");
    expect(docs["projectinfo.json"].Remarks).toBe("Converted from dike.dxf");
    expect(docs["projectinfo.json"].Created).toBe("2000-01-01T00:00:00");
  });

  it("fails when a layer refers to a soil missing from the profile", () => {
    const broken: SoilProfile = { ...PROFILE, soils: [] };
    expect(() => buildStixDocuments(broken)).toThrow(
      'Soil "ongedefinieerd" is used by a layer but missing from the profile',
    );
  });
});

describe("serializeStix", () => {
  it("zips one JSON document per entry", async () => {
    const zip = await JSZip.loadAsync(await serializeStix(PROFILE));
    const entries = Object.keys(zip.files).sort();
    expect(entries).toEqual([
      "calculationsettings/calculationsettings.json",
      "decorations/decorations.json",
      "geometries/geometry.json",
      "loads/loads.json",
      "nailpropertiesforsoils.json",
      "projectinfo.json",
      "reinforcements/reinforcements.json",
      "scenarios/scenario.json",
      "soilcorrelations.json",
      "soillayers/soillayers.json",
      "soils.json",
      "soilvisualizations.json",
      "statecorrelations/statecorrelations.json",
      "states/state.json",
      "waternetcreatorsettings/waternetcreatorsettings.json",
      "waternets/waternet.json",
    ]);
    const geometryFile = zip.file("geometries/geometry.json");
    expect(geometryFile).not.toBeNull();
    const geometry = JSON.parse((await geometryFile?.async("string")) ?? "{}");
    expect(geometry.Layers).toHaveLength(2);
  });

  it("resolves every document a stage or calculation refers to", async () => {
    const zip = await JSZip.loadAsync(await serializeStix(PROFILE));
    const entryById = new Map<string, string>();
    for (const name of Object.keys(zip.files)) {
      const document = JSON.parse((await zip.file(name)?.async("string")) ?? "{}");
      if (typeof document.Id === "string") entryById.set(document.Id, name);
    }

    const scenario = JSON.parse((await zip.file("scenarios/scenario.json")?.async("string")) ?? "{}");
    const [stage] = scenario.Stages;
    expect({
      GeometryId: entryById.get(stage.GeometryId),
      SoilLayersId: entryById.get(stage.SoilLayersId),
      WaternetId: entryById.get(stage.WaternetId),
      WaternetCreatorSettingsId: entryById.get(stage.WaternetCreatorSettingsId),
      StateId: entryById.get(stage.StateId),
      StateCorrelationsId: entryById.get(stage.StateCorrelationsId),
      LoadsId: entryById.get(stage.LoadsId),
      ReinforcementsId: entryById.get(stage.ReinforcementsId),
      DecorationsId: entryById.get(stage.DecorationsId),
      CalculationSettingsId: entryById.get(scenario.Calculations[0].CalculationSettingsId),
    }).toEqual({
      GeometryId: "geometries/geometry.json",
      SoilLayersId: "soillayers/soillayers.json",
      WaternetId: "waternets/waternet.json",
      WaternetCreatorSettingsId: "waternetcreatorsettings/waternetcreatorsettings.json",
      StateId: "states/state.json",
      StateCorrelationsId: "statecorrelations/statecorrelations.json",
      LoadsId: "loads/loads.json",
      ReinforcementsId: "reinforcements/reinforcements.json",
      DecorationsId: "decorations/decorations.json",
      CalculationSettingsId: "calculationsettings/calculationsettings.json",
    });
  });

  it("produces identical bytes for identical profiles", async () => {
    const first = await serializeStix(PROFILE, "dike.dxf");
    const second = await serializeStix(PROFILE, "dike.dxf");
    expect(first.equals(second)).toBe(true);
  });
});

describe("writeStixFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "stix-writer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the archive to the given path", async () => {
    const target = path.join(dir, "dike.stix");
    await writeStixFile(PROFILE, target, path.join(dir, "dike.dxf"));
    const bytes = await readFile(target);
    // zip local file header
    expect(bytes.subarray(0, 4).toString("hex")).toBe("504b0304");
    expect(await readdir(dir)).toEqual(["dike.stix"]);
  });

  it("throws IOError when the target cannot be written", async () => {
    const target = path.join(dir, "missing", "dike.stix");
    const err = await writeStixFile(PROFILE, target, "dike.dxf").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IOError);
    if (err instanceof IOError) {
      expect(err.step).toBe("write");
      expect(err.path).toBe(target);
      expect(err.message).toMatch(/^Cannot write ".*dike\.stix": ENOENT/);
    }
  });
});

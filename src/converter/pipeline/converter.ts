import { rm } from "fs/promises";
import path from "path";

import { SnapshotCollector } from "@/converter/debug/collector";
import { clearDebugImages, renderDebugImages } from "@/converter/debug/debug-renderer";
import { readDxfFile } from "@/converter/dxf/parser";
import { assemblePolygons } from "@/converter/geometry/polygon-assembler";
import { buildProfile } from "@/converter/profile/profile-builder";
import { stixPathFor, writeStixFile } from "@/converter/stix/stix-writer";
import { normalizeError, type NormalizedError } from "@/lib/utils/normalizeError";
import type { ConversionStep } from "@/shared/errors";
import type { SoilDefinition } from "@/shared/types/profile";

export interface ConvertOptions {
  /** Round coordinates to this many decimals on read; null/undefined keeps them exact */
  decimals?: number | null;
  ignoreLayers?: string[];
  soils?: SoilDefinition[];
  /** Write debug images when reading, assembling or building fails (default true) */
  debugImages?: boolean;
}

export type ConversionResult =
  | {
      success: true;
      file: string;
      outputPath: string;
      /** Number of soil layers written */
      layers: number;
      warnings: string[];
    }
  | {
      success: false;
      file: string;
      step: ConversionStep;
      error: NormalizedError;
      /** Debug images written for this failure */
      debugImages: string[];
      warnings: string[];
    };

/** A failed file must not keep the .stix of an earlier, successful run */
async function removeStaleOutput(outputPath: string): Promise<void> {
  try {
    await rm(outputPath, { force: true });
  } catch (err) {
    console.error(`[dxf2stix] Could not remove stale output ${outputPath}:`, err);
  }
}

/**
 * Convert one DXF file into a sibling .stix file.
 * Never throws: failures come back as `success: false` with the step that failed.
 * A failed file is left with no .stix, only this run's debug images.
 */
export async function convertDxfFile(file: string, options: ConvertOptions = {}): Promise<ConversionResult> {
  const collector = new SnapshotCollector();
  let step: ConversionStep = "read";
  let warnings: string[] = [];
  const outputPath = stixPathFor(file);

  await clearDebugImages(file);
  try {
    const parsed = await readDxfFile(
      file,
      { decimals: options.decimals, ignoreLayers: options.ignoreLayers },
      collector,
    );
    warnings = parsed.warnings;

    step = "assemble";
    const polygons = assemblePolygons(parsed.layers, file, collector);

    step = "build";
    const profile = buildProfile(
      polygons,
      { name: path.parse(file).name, file, soils: options.soils },
      collector,
    );

    step = "write";
    await writeStixFile(profile, outputPath, file);

    return { success: true, file, outputPath, layers: profile.layers.length, warnings };
  } catch (err) {
    await removeStaleOutput(outputPath);
    // Debug images describe geometry; a failed write has nothing new to show
    const debugImages =
      options.debugImages !== false && step !== "write"
        ? await renderDebugImages(file, collector.snapshots)
        : [];
    return { success: false, file, step, error: normalizeError(err), debugImages, warnings };
  }
}

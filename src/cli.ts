/**
 * Batch conversion of DXF cross-sections to DStability .stix files.
 * Entry point: src/bin/dxf2stix.ts
 */
import path from "path";

import { loadEnvFiles, resolveConfig, USAGE } from "@/config/config";
import { loadSoilDefinitions } from "@/config/soils";
import { convertBatch } from "@/converter/pipeline/batch";
import { findDxfFiles } from "@/converter/pipeline/file-discovery";
import { ConfigError } from "@/shared/errors";

export async function main(argv: string[]): Promise<number> {
  loadEnvFiles();

  let files: string[];
  let config: ReturnType<typeof resolveConfig>;
  let soils: Awaited<ReturnType<typeof loadSoilDefinitions>> = [];
  try {
    config = resolveConfig(argv);
    if (config.help) {
      console.log(USAGE);
      return 0;
    }
    if (config.soilsFile) soils = await loadSoilDefinitions(config.soilsFile);
    files =
      config.files.length > 0
        ? config.files.map((f) => path.resolve(f))
        : await findDxfFiles(config.inputDir);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[dxf2stix] ${err.message}`);
      console.error(USAGE);
      return 2;
    }
    throw err;
  }

  if (files.length === 0) {
    console.log(`[dxf2stix] No .dxf files found in ${path.resolve(config.inputDir)}`);
    return 0;
  }

  const summary = await convertBatch(files, {
    decimals: config.decimals ?? null,
    soils,
    continueOnError: config.continueOnError,
    debugImages: config.debugImages,
  });

  console.log(
    `[dxf2stix] Done: ${summary.converted} converted, ${summary.failed} failed` +
      (summary.skipped.length > 0 ? `, ${summary.skipped.length} skipped` : ""),
  );
  return summary.failed > 0 ? 1 : 0;
}

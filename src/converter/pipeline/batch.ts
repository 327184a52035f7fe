import { convertDxfFile, type ConversionResult, type ConvertOptions } from "@/converter/pipeline/converter";
import type { ConversionStep } from "@/shared/errors";

export interface BatchOptions extends ConvertOptions {
  /** Keep converting after a failed file (default true) */
  continueOnError?: boolean;
}

export interface BatchSummary {
  results: ConversionResult[];
  converted: number;
  failed: number;
  /** Files not attempted because the batch stopped at a failure */
  skipped: string[];
}

const STEP_LABELS: Record<ConversionStep, string> = {
  read: "reading the DXF",
  assemble: "assembling layer polygons",
  build: "building the soil profile",
  write: "writing the STIX file",
};

function report(result: ConversionResult): void {
  for (const warning of result.warnings) console.warn(`[dxf2stix]   warning: ${warning}`);

  if (result.success) {
    console.log(`[dxf2stix]   wrote ${result.outputPath} (${result.layers} layers)`);
    return;
  }
  console.error(`[dxf2stix]   failed while ${STEP_LABELS[result.step]}: ${result.error.message}`);
  if (result.debugImages.length > 0) {
    console.error(`[dxf2stix]   debug images: ${result.debugImages.join(", ")}`);
  }
}

function summarize(results: ConversionResult[], skipped: string[]): BatchSummary {
  const converted = results.filter((r) => r.success).length;
  return { results, converted, failed: results.length - converted, skipped };
}

/** Convert files one after another; each file is isolated from the others */
export async function convertBatch(files: readonly string[], options: BatchOptions = {}): Promise<BatchSummary> {
  const continueOnError = options.continueOnError ?? true;
  const results: ConversionResult[] = [];

  for (let i = 0; i < files.length; i++) {
    console.log(`[dxf2stix] Converting ${files[i]}…`);
    const result = await convertDxfFile(files[i], options);
    results.push(result);
    report(result);

    if (!result.success && !continueOnError) return summarize(results, files.slice(i + 1));
  }

  return summarize(results, []);
}

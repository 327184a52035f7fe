import { readFile } from "fs/promises";

import { z } from "zod";

import { ConfigError } from "@/shared/errors";
import type { SoilDefinition } from "@/shared/types/profile";

// Colours handed out to soils that do not set one
const SOIL_COLORS = ["#C8A064", "#6E8C3C", "#8C6E50", "#B4B4DC", "#DCC878", "#78A0B4"];

const soilSchema = z.object({
  code: z.string().trim().min(1),
  name: z.string().trim().min(1).optional(),
  layers: z.array(z.string()).default([]),
  unsaturatedWeight: z.number().positive(),
  saturatedWeight: z.number().positive(),
  cohesion: z.number().min(0),
  frictionAngle: z.number().min(0).max(90),
  dilatancy: z.number().min(0).max(90).default(0),
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, "expected a #RRGGBB colour")
    .optional(),
});

export const soilsFileSchema = z.object({
  soils: z.array(soilSchema),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** Validate parsed JSON and fill in names and colours */
export function parseSoilDefinitions(json: unknown, source = "soil definitions"): SoilDefinition[] {
  const parsed = soilsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  }

  const seen = new Set<string>();
  return parsed.data.soils.map((soil, i) => {
    const key = soil.code.toLowerCase();
    if (seen.has(key)) throw new ConfigError(`Invalid ${source}: soil code "${soil.code}" is defined twice`);
    seen.add(key);
    return {
      ...soil,
      name: soil.name ?? soil.code,
      color: soil.color ?? SOIL_COLORS[i % SOIL_COLORS.length],
    };
  });
}

export async function loadSoilDefinitions(file: string): Promise<SoilDefinition[]> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(file, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read soil definitions "${file}": ${reason}`, { cause: err });
  }
  return parseSoilDefinitions(json, `soil definitions "${file}"`);
}

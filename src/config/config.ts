import { parseArgs } from "util";

import dotenv from "dotenv";
import { z } from "zod";

import { DEFAULT_INPUT_DIR } from "@/shared/constants";
import { ConfigError } from "@/shared/errors";

export const USAGE = `Usage: dxf2stix [files...] [options]

Converts DXF cross-sections into DStability .stix files written next to each input.
Without files, every .dxf below the input directory is converted.

Options:
  --input-dir <dir>    directory to scan (default ${DEFAULT_INPUT_DIR}, env DXF2STIX_INPUT_DIR)
  --decimals <n>       round coordinates to n decimals on read (env DXF2STIX_DECIMALS)
  --soils <file>       JSON soil definitions mapped onto layer names (env DXF2STIX_SOILS_FILE)
  --stop-on-error      stop at the first failed file (env DXF2STIX_CONTINUE_ON_ERROR=false)
  --no-debug-images    do not write debug images on failure (env DXF2STIX_DEBUG_IMAGES=false)
  -h, --help           show this help
`;

const booleanSetting = z.union([
  z.boolean(),
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((v) => v === "true" || v === "1" || v === "yes"),
]);

export const configSchema = z.object({
  inputDir: z.string().min(1).default(DEFAULT_INPUT_DIR),
  files: z.array(z.string().min(1)).default([]),
  decimals: z.coerce.number().int().min(0).max(10).optional(),
  soilsFile: z.string().min(1).optional(),
  continueOnError: booleanSetting.default(true),
  debugImages: booleanSetting.default(true),
  help: z.boolean().default(false),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Load .env then .env.local, the latter taking precedence */
export function loadEnvFiles(): void {
  dotenv.config();
  dotenv.config({ path: ".env.local", override: true });
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Merge CLI flags over environment values and validate the result */
export function resolveConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(reason, { cause: err });
  }
  const { values, positionals } = parsed;

  const result = configSchema.safeParse({
    inputDir: values["input-dir"] ?? envValue(env, "DXF2STIX_INPUT_DIR"),
    files: positionals,
    decimals: values.decimals ?? envValue(env, "DXF2STIX_DECIMALS"),
    soilsFile: values.soils ?? envValue(env, "DXF2STIX_SOILS_FILE"),
    continueOnError: values["stop-on-error"] ? false : envValue(env, "DXF2STIX_CONTINUE_ON_ERROR")?.toLowerCase(),
    debugImages: values["no-debug-images"] ? false : envValue(env, "DXF2STIX_DEBUG_IMAGES")?.toLowerCase(),
    help: values.help ?? false,
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "input-dir": { type: "string" },
      decimals: { type: "string" },
      soils: { type: "string" },
      "stop-on-error": { type: "boolean" },
      "no-debug-images": { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

import { readdir } from "fs/promises";
import path from "path";

import { DXF_EXTENSION } from "@/shared/constants";
import { ConfigError } from "@/shared/errors";

/** All DXF files below `dir`, extension matched case-insensitively, sorted by path */
export async function findDxfFiles(dir: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(current: string): Promise<void> {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) await walk(full);
      else if (entry.isFile() && path.extname(entry.name).toLowerCase() === DXF_EXTENSION) {
        found.push(path.resolve(full));
      }
    }
  }

  try {
    await walk(dir);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot scan input directory "${dir}": ${reason}`, { cause: err });
  }

  return found.sort();
}

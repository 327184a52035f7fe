import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { renderDebugImages } from "@/converter/debug/debug-renderer";
import { convertDxfFile } from "@/converter/pipeline/converter";

import { OPEN_LAYER, TWO_LAYERS } from "../../../../tests/fixtures/dxf";

// Stands in for a platform where the native canvas binding cannot load
vi.mock("@napi-rs/canvas", () => {
  throw new Error("native binding not found");
});

describe("debug images without a canvas binding", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "debug-binding-"));
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("still converts valid drawings", async () => {
    const file = path.join(dir, "dike.dxf");
    await writeFile(file, TWO_LAYERS);
    const result = await convertDxfFile(file);
    expect(result.success).toBe(true);
  });

  it("reports the failure of the drawing, not of the renderer", async () => {
    const file = path.join(dir, "open.dxf");
    await writeFile(file, OPEN_LAYER);
    const result = await convertDxfFile(file);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.step).toBe("assemble");
    expect(result.debugImages).toEqual([]);
    expect(await readdir(dir)).toEqual(["open.dxf"]);
  });

  it("logs each image it could not render", async () => {
    const written = await renderDebugImages(path.join(dir, "dike.dxf"), [
      { step: "read", segments: [], polygons: [], markers: [] },
    ]);
    expect(written).toEqual([]);
    expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1);
    expect(String(vi.mocked(console.error).mock.calls[0][0])).toBe(
      `[debug-renderer] Could not write ${path.join(dir, "dike.debug.01-read.png")}:`,
    );
  });
});

/**
 * Rasterises the geometry a failed conversion reached, one PNG per recorded step:
 * `<dir>/<stem>.debug.<NN>-<step>.png`. The build step also gets one frame per
 * layer added, `<stem>.debug.03-build.<KK>.png`. Diagnostic output only; every
 * failure in here is logged and swallowed, including a canvas binding that
 * fails to load.
 */
import { readdir, rm, writeFile } from "fs/promises";
import path from "path";

import type { SKRSContext2D } from "@napi-rs/canvas";

import type { DebugSnapshot } from "@/converter/debug/collector";
import { boundsOf } from "@/converter/geometry/geometry";
import { CONVERSION_STEPS } from "@/shared/constants";
import type { Point2D } from "@/shared/types/geometry";

const IMAGE_SIZE = 1000;
const MARGIN = 60;

// Fixed palette so repeated runs draw identical images
const PALETTE = [
  "#1f77b4",
  "#ff7f0e",
  "#2ca02c",
  "#d62728",
  "#9467bd",
  "#8c564b",
  "#e377c2",
  "#7f7f7f",
  "#bcbd22",
  "#17becf",
];

const STYLE = {
  background: "#ffffff",
  edge: "#000000",
  marker: "#e00000",
  fillAlpha: 0.5,
  lineWidth: 1.5,
  highlightWidth: 4,
  vertexRadius: 3,
  markerRadius: 9,
};

function twoDigits(n: number): string {
  return String(n).padStart(2, "0");
}

/** `frame` numbers the per-layer images of a step, starting at 1 */
export function debugImagePath(inputPath: string, snapshot: DebugSnapshot, frame?: number): string {
  const { dir, name } = path.parse(inputPath);
  const number = twoDigits(CONVERSION_STEPS.indexOf(snapshot.step) + 1);
  const suffix = frame == null ? "" : `.${twoDigits(frame)}`;
  return path.join(dir, `${name}.debug.${number}-${snapshot.step}${suffix}.png`);
}

/** The step image itself, then for the build step one frame per layer as it is added */
function debugImages(inputPath: string, snapshot: DebugSnapshot): Array<{ target: string; snapshot: DebugSnapshot }> {
  const images = [{ target: debugImagePath(inputPath, snapshot), snapshot }];
  if (snapshot.step !== "build") return images;

  const { polygons } = snapshot;
  polygons.forEach((polygon, i) => {
    images.push({
      target: debugImagePath(inputPath, snapshot, i + 1),
      snapshot: {
        step: snapshot.step,
        segments: [],
        polygons: polygons.slice(0, i + 1),
        markers: [],
        note: `adding layer "${polygon.layer}" (${i + 1} of ${polygons.length})`,
      },
    });
  });
  return images;
}

function layerColors(snapshot: DebugSnapshot): Map<string, string> {
  const colors = new Map<string, string>();
  const names = [...snapshot.segments.map((s) => s.layer), ...snapshot.polygons.map((p) => p.layer)];
  for (const name of names) {
    if (!colors.has(name)) colors.set(name, PALETTE[colors.size % PALETTE.length]);
  }
  return colors;
}

/** Maps drawing coordinates onto the image, y up, preserving aspect ratio */
function projection(snapshot: DebugSnapshot): (p: Point2D) => [number, number] {
  const pointSets = [
    ...snapshot.polygons.map((p) => p.vertices),
    snapshot.segments.flatMap(({ segment }) => [segment.start, segment.end]),
    snapshot.markers,
  ].filter((points) => points.length > 0);

  if (pointSets.length === 0) return () => [IMAGE_SIZE / 2, IMAGE_SIZE / 2];

  const box = boundsOf(pointSets);
  const width = Math.max(box.xmax - box.xmin, 1e-9);
  const height = Math.max(box.ymax - box.ymin, 1e-9);
  const scale = (IMAGE_SIZE - 2 * MARGIN) / Math.max(width, height);
  return (p) => [MARGIN + (p.x - box.xmin) * scale, IMAGE_SIZE - MARGIN - (p.y - box.ymin) * scale];
}

function drawSnapshot(ctx: SKRSContext2D, snapshot: DebugSnapshot): void {
  const project = projection(snapshot);
  const colors = layerColors(snapshot);

  ctx.fillStyle = STYLE.background;
  ctx.fillRect(0, 0, IMAGE_SIZE, IMAGE_SIZE);
  ctx.lineWidth = STYLE.lineWidth;

  for (const polygon of snapshot.polygons) {
    ctx.beginPath();
    polygon.vertices.forEach((v, i) => {
      const [x, y] = project(v);
      if (i === 0) ctx.moveTo(x, y);
      else ctx.lineTo(x, y);
    });
    ctx.closePath();
    ctx.globalAlpha = STYLE.fillAlpha;
    ctx.fillStyle = colors.get(polygon.layer) ?? PALETTE[0];
    ctx.fill();
    ctx.globalAlpha = 1;
    ctx.strokeStyle = STYLE.edge;
    ctx.stroke();
  }

  for (const { layer, segment } of snapshot.segments) {
    const color = colors.get(layer) ?? PALETTE[0];
    const [x1, y1] = project(segment.start);
    const [x2, y2] = project(segment.end);
    ctx.strokeStyle = color;
    ctx.beginPath();
    ctx.moveTo(x1, y1);
    ctx.lineTo(x2, y2);
    ctx.stroke();
    ctx.fillStyle = color;
    for (const [x, y] of [
      [x1, y1],
      [x2, y2],
    ]) {
      ctx.beginPath();
      ctx.arc(x, y, STYLE.vertexRadius, 0, Math.PI * 2);
      ctx.fill();
    }
  }

  ctx.strokeStyle = STYLE.marker;
  if (snapshot.highlight) {
    const [x1, y1] = project(snapshot.highlight.start);
    const [x2, y2] = project(snapshot.highlight.end);
    ctx.lineWidth = STYLE.highlightWidth;
    ctx.beginPath();
    ctx.moveTo(x1, y1);
    ctx.lineTo(x2, y2);
    ctx.stroke();
  }
  ctx.lineWidth = STYLE.lineWidth * 2;
  for (const marker of snapshot.markers) {
    const [x, y] = project(marker);
    ctx.beginPath();
    ctx.arc(x, y, STYLE.markerRadius, 0, Math.PI * 2);
    ctx.stroke();
  }

  ctx.fillStyle = STYLE.edge;
  ctx.font = "16px sans-serif";
  ctx.fillText(`step: ${snapshot.step}`, 12, 24);
  if (snapshot.note) ctx.fillText(snapshot.note, 12, 46, IMAGE_SIZE - 24);
}

export async function renderSnapshot(snapshot: DebugSnapshot): Promise<Buffer> {
  const { createCanvas } = await import("@napi-rs/canvas");
  const canvas = createCanvas(IMAGE_SIZE, IMAGE_SIZE);
  drawSnapshot(canvas.getContext("2d"), snapshot);
  return canvas.encode("png");
}

/**
 * Write the images of every recorded step. Returns the paths actually written;
 * never rejects.
 */
export async function renderDebugImages(inputPath: string, snapshots: readonly DebugSnapshot[]): Promise<string[]> {
  const written: string[] = [];
  for (const { target, snapshot } of snapshots.flatMap((s) => debugImages(inputPath, s))) {
    try {
      await writeFile(target, await renderSnapshot(snapshot));
      written.push(target);
    } catch (err) {
      console.error(`[debug-renderer] Could not write ${target}:`, err);
    }
  }
  return written;
}

/** Remove debug images an earlier run left for this input; never rejects */
export async function clearDebugImages(inputPath: string): Promise<void> {
  const { dir, name } = path.parse(inputPath);
  const prefix = `${name}.debug.`;
  try {
    const stale = (await readdir(dir)).filter((f) => f.startsWith(prefix) && f.endsWith(".png"));
    for (const file of stale) await rm(path.join(dir, file), { force: true });
  } catch (err) {
    // no directory, nothing to clear
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
    console.error(`[debug-renderer] Could not clear old debug images of ${inputPath}:`, err);
  }
}

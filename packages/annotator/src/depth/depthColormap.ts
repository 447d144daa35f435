import type { Rect } from "@depthmark/view-core";

import type { DepthBand } from "../config";
import { isValidDepth } from "./depthStats";
import type { DepthGrid } from "./depthStats";

export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

function jetChannel(value: number, center: number): number {
  const level = 1.5 - Math.abs(4 * value - center);
  return Math.round(255 * Math.min(1, Math.max(0, level)));
}

/** Jet palette on [0, 1]: dark blue through cyan, yellow to dark red. */
export function jetColor(value: number): [number, number, number] {
  return [jetChannel(value, 3), jetChannel(value, 2), jetChannel(value, 1)];
}

/**
 * Renders depth as RGBA. Readings are clipped to the band and inverted so near
 * surfaces come out warm; cells without a valid reading are black.
 */
export function renderDepthColormap(grid: DepthGrid, band: DepthBand): RgbaImage {
  const { width, height } = grid;
  const span = band.maxDepth - band.minDepth;
  if (!(span > 0)) {
    throw new RangeError(`Depth band [${band.minDepth}, ${band.maxDepth}] is empty`);
  }

  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < width * height; i += 1) {
    const value = grid.data[i] ?? Number.NaN;
    const offset = i * 4;
    data[offset + 3] = 255;
    if (!isValidDepth(value, band)) {
      continue;
    }
    const level = Math.floor(((value - band.minDepth) / span) * 255);
    const [r, g, b] = jetColor((255 - level) / 255);
    data[offset] = r;
    data[offset + 1] = g;
    data[offset + 2] = b;
  }
  return { width, height, data };
}

/** Copies the cells covered by `window`, widened outward to whole cells. */
export function cropDepthGrid(grid: DepthGrid, window: Rect): DepthGrid {
  const x0 = Math.max(0, Math.floor(window.x));
  const y0 = Math.max(0, Math.floor(window.y));
  const x1 = Math.min(grid.width, Math.ceil(window.x + window.w));
  const y1 = Math.min(grid.height, Math.ceil(window.y + window.h));
  const width = Math.max(0, x1 - x0);
  const height = Math.max(0, y1 - y0);

  const data = new Float64Array(width * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      data[y * width + x] = grid.data[(y0 + y) * grid.width + x0 + x] ?? Number.NaN;
    }
  }
  return { width, height, data };
}

import type { Rect } from "@depthmark/view-core";

import type { DepthBand } from "../config";

/** Metric depth in metres, row-major. Non-finite or non-positive cells carry no reading. */
export type DepthGrid = {
  width: number;
  height: number;
  data: ArrayLike<number>;
};

export type DepthStats = {
  mean: number;
  min: number;
  max: number;
  /** Population standard deviation. */
  std: number;
  count: number;
};

export type DepthStatsResult =
  | {
      ok: true;
      stats: DepthStats;
    }
  | {
      ok: false;
      reason: "no-depth" | "empty-region" | "no-valid-data";
    };

export function isValidDepth(value: number, band: DepthBand): boolean {
  return Number.isFinite(value) && value > 0 && value >= band.minDepth && value <= band.maxDepth;
}

/** Pixel bounds of `rect` inside the grid, or null when nothing overlaps. */
function regionBounds(grid: DepthGrid, rect: Rect): { x1: number; y1: number; x2: number; y2: number } | null {
  const x1 = Math.max(0, Math.round(rect.x));
  const y1 = Math.max(0, Math.round(rect.y));
  const x2 = Math.min(grid.width, Math.round(rect.x + rect.w));
  const y2 = Math.min(grid.height, Math.round(rect.y + rect.h));
  if (x2 <= x1 || y2 <= y1) {
    return null;
  }
  return { x1, y1, x2, y2 };
}

export function computeDepthStats(grid: DepthGrid | null, rect: Rect, band: DepthBand): DepthStatsResult {
  if (!grid) {
    return { ok: false, reason: "no-depth" };
  }
  const region = regionBounds(grid, rect);
  if (!region) {
    return { ok: false, reason: "empty-region" };
  }

  const values: number[] = [];
  for (let y = region.y1; y < region.y2; y += 1) {
    const row = y * grid.width;
    for (let x = region.x1; x < region.x2; x += 1) {
      const value = grid.data[row + x] ?? Number.NaN;
      if (isValidDepth(value, band)) {
        values.push(value);
      }
    }
  }
  if (values.length === 0) {
    return { ok: false, reason: "no-valid-data" };
  }

  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    sum += value;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  const mean = sum / values.length;
  let squares = 0;
  for (const value of values) {
    squares += (value - mean) * (value - mean);
  }

  return {
    ok: true,
    stats: { mean, min, max, std: Math.sqrt(squares / values.length), count: values.length }
  };
}

export function formatDepthStats(result: DepthStatsResult | null): string {
  if (!result) {
    return "Mean depth: -";
  }
  if (!result.ok) {
    return result.reason === "no-depth" ? "Mean depth: - (no depth data)" : "Mean depth: - (no valid data)";
  }
  const { mean, min, max, std } = result.stats;
  return `Mean: ${mean.toFixed(2)} m | Min: ${min.toFixed(2)} | Max: ${max.toFixed(2)} | Std: ${std.toFixed(2)}`;
}

/** Keeps the band at least one metre wide, moving the upper bound. */
export function normalizeDepthBand(minDepth: number, maxDepth: number): DepthBand {
  if (!Number.isFinite(minDepth) || !Number.isFinite(maxDepth) || minDepth < 0) {
    throw new RangeError(`Invalid depth band [${minDepth}, ${maxDepth}]`);
  }
  return { minDepth, maxDepth: Math.max(maxDepth, minDepth + 1) };
}

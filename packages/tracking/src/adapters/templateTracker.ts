import { clamp, isValidFrame } from "@depthmark/view-core";
import type { ImageFrame, Rect } from "@depthmark/view-core";

import type { TrackerHandle, TrackerKind, TrackerUpdate } from "../TrackerPort";

export type TemplateTrackerPreset = {
  /** Upper bound on template samples per axis; larger boxes are subsampled. */
  maxSamples: number;
  searchRadius: number;
  searchStep: number;
  refineRadius: number;
  lostThreshold: number;
  templateUpdateRate: number;
  minRectSize: number;
};

/**
 * Each tracker kind trades accuracy for speed: csrt scans every offset,
 * mosse scans a coarse grid and refines around the best hit.
 */
export const TRACKER_PRESETS: Record<TrackerKind, TemplateTrackerPreset> = {
  csrt: {
    maxSamples: 32,
    searchRadius: 24,
    searchStep: 1,
    refineRadius: 0,
    lostThreshold: 0.3,
    templateUpdateRate: 0.1,
    minRectSize: 4
  },
  kcf: {
    maxSamples: 24,
    searchRadius: 20,
    searchStep: 2,
    refineRadius: 2,
    lostThreshold: 0.32,
    templateUpdateRate: 0.12,
    minRectSize: 4
  },
  mosse: {
    maxSamples: 16,
    searchRadius: 16,
    searchStep: 4,
    refineRadius: 3,
    lostThreshold: 0.35,
    templateUpdateRate: 0.15,
    minRectSize: 4
  }
};

type SampleGrid = {
  xs: Int32Array;
  ys: Int32Array;
};

type Match = {
  x: number;
  y: number;
  score: number;
};

export function resolveTrackerPreset(
  kind: TrackerKind,
  overrides?: Partial<TemplateTrackerPreset>
): TemplateTrackerPreset {
  return { ...TRACKER_PRESETS[kind], ...(overrides ?? {}) };
}

export function buildLumaFrame(frame: ImageFrame): Uint8ClampedArray {
  const { data, width, height } = frame;
  const luma = new Uint8ClampedArray(width * height);
  for (let i = 0, j = 0; j < luma.length; i += 4, j += 1) {
    const r = data[i] ?? 0;
    const g = data[i + 1] ?? 0;
    const b = data[i + 2] ?? 0;
    luma[j] = Math.round(r * 0.2126 + g * 0.7152 + b * 0.0722);
  }
  return luma;
}

function buildAxisOffsets(length: number, maxSamples: number): Int32Array {
  const count = Math.max(1, Math.min(length, Math.floor(maxSamples)));
  const stride = length / count;
  const offsets = new Int32Array(count);
  for (let i = 0; i < count; i += 1) {
    offsets[i] = Math.min(length - 1, Math.floor((i + 0.5) * stride));
  }
  return offsets;
}

function buildSampleGrid(rect: Rect, maxSamples: number): SampleGrid {
  return {
    xs: buildAxisOffsets(rect.w, maxSamples),
    ys: buildAxisOffsets(rect.h, maxSamples)
  };
}

function extractTemplate(
  luma: Uint8ClampedArray,
  width: number,
  originX: number,
  originY: number,
  grid: SampleGrid
): Uint8ClampedArray {
  const template = new Uint8ClampedArray(grid.xs.length * grid.ys.length);
  let idx = 0;
  for (const dy of grid.ys) {
    const row = (originY + dy) * width + originX;
    for (const dx of grid.xs) {
      template[idx] = luma[row + dx] ?? 0;
      idx += 1;
    }
  }
  return template;
}

function computeSad(
  luma: Uint8ClampedArray,
  width: number,
  template: Uint8ClampedArray,
  grid: SampleGrid,
  originX: number,
  originY: number
): number {
  let sum = 0;
  let idx = 0;
  for (const dy of grid.ys) {
    const row = (originY + dy) * width + originX;
    for (const dx of grid.xs) {
      const diff = (luma[row + dx] ?? 0) - (template[idx] ?? 0);
      sum += diff < 0 ? -diff : diff;
      idx += 1;
    }
  }
  return sum / (255 * template.length);
}

function searchWindow(
  luma: Uint8ClampedArray,
  frame: ImageFrame,
  template: Uint8ClampedArray,
  grid: SampleGrid,
  size: Rect,
  centerX: number,
  centerY: number,
  radius: number,
  step: number,
  best: Match
): Match {
  const maxOriginX = frame.width - size.w;
  const maxOriginY = frame.height - size.h;
  const minX = clamp(centerX - radius, 0, maxOriginX);
  const maxX = clamp(centerX + radius, 0, maxOriginX);
  const minY = clamp(centerY - radius, 0, maxOriginY);
  const maxY = clamp(centerY + radius, 0, maxOriginY);

  for (let y = minY; y <= maxY; y += step) {
    for (let x = minX; x <= maxX; x += step) {
      const score = computeSad(luma, frame.width, template, grid, x, y);
      if (score < best.score) {
        best = { x, y, score };
      }
    }
  }
  return best;
}

function blendTemplate(current: Uint8ClampedArray, next: Uint8ClampedArray, rate: number): void {
  const keep = 1 - rate;
  for (let i = 0; i < current.length; i += 1) {
    const currentVal = current[i] ?? 0;
    const nextVal = next[i] ?? 0;
    current[i] = Math.round(currentVal * keep + nextVal * rate);
  }
}

/**
 * Luma template matcher. The box keeps its size; only its origin is searched
 * around the previous position using a sum of absolute differences.
 */
export class TemplateTracker implements TrackerHandle {
  readonly kind: TrackerKind;
  private readonly preset: TemplateTrackerPreset;
  private template: Uint8ClampedArray | null = null;
  private grid: SampleGrid | null = null;
  private rect: Rect | null = null;

  constructor(kind: TrackerKind, overrides?: Partial<TemplateTrackerPreset>) {
    this.kind = kind;
    this.preset = resolveTrackerPreset(kind, overrides);
    if (!(this.preset.searchStep >= 1) || !(this.preset.maxSamples >= 1)) {
      throw new RangeError(`Invalid ${kind} tracker preset`);
    }
  }

  init(frame: ImageFrame, rect: Rect): boolean {
    this.reset();
    if (!isValidFrame(frame)) {
      return false;
    }
    const target = {
      x: Math.round(rect.x),
      y: Math.round(rect.y),
      w: Math.round(rect.w),
      h: Math.round(rect.h)
    };
    if (target.w < this.preset.minRectSize || target.h < this.preset.minRectSize) {
      return false;
    }
    if (target.x < 0 || target.y < 0 || target.x + target.w > frame.width || target.y + target.h > frame.height) {
      return false;
    }

    const grid = buildSampleGrid(target, this.preset.maxSamples);
    this.template = extractTemplate(buildLumaFrame(frame), frame.width, target.x, target.y, grid);
    this.grid = grid;
    this.rect = target;
    return true;
  }

  update(frame: ImageFrame): TrackerUpdate {
    const { template, grid, rect } = this;
    if (!template || !grid || !rect) {
      return { ok: false, reason: "not-initialized" };
    }
    if (!isValidFrame(frame)) {
      return { ok: false, reason: "invalid-frame" };
    }
    if (rect.w > frame.width || rect.h > frame.height) {
      return { ok: false, reason: "target-larger-than-frame" };
    }

    const luma = buildLumaFrame(frame);
    const { searchRadius, searchStep, refineRadius, lostThreshold, templateUpdateRate } = this.preset;
    let best = searchWindow(luma, frame, template, grid, rect, rect.x, rect.y, searchRadius, searchStep, {
      x: rect.x,
      y: rect.y,
      score: Number.POSITIVE_INFINITY
    });
    if (refineRadius > 0 && searchStep > 1) {
      best = searchWindow(luma, frame, template, grid, rect, best.x, best.y, refineRadius, 1, best);
    }

    if (!Number.isFinite(best.score) || best.score > lostThreshold) {
      return { ok: false, reason: "target-lost" };
    }

    // Only confident matches refresh the template.
    if (templateUpdateRate > 0 && best.score < lostThreshold / 2) {
      blendTemplate(template, extractTemplate(luma, frame.width, best.x, best.y, grid), templateUpdateRate);
    }

    const next = { x: best.x, y: best.y, w: rect.w, h: rect.h };
    this.rect = next;
    return { ok: true, rect: { ...next }, score: best.score };
  }

  reset(): void {
    this.template = null;
    this.grid = null;
    this.rect = null;
  }
}

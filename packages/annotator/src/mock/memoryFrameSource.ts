import { InMemoryFrameProvider } from "@depthmark/tracking";
import type { ImageFrame } from "@depthmark/view-core";

import type { DepthGrid } from "../depth/depthStats";
import type { FrameSource } from "../frames/FrameSource";

export class InMemoryFrameSource extends InMemoryFrameProvider implements FrameSource {
  private readonly depths: ReadonlyArray<DepthGrid | null>;

  constructor(frames: ImageFrame[], depths: ReadonlyArray<DepthGrid | null> = [], options: { failing?: Iterable<number> } = {}) {
    super(frames, options);
    this.depths = depths;
  }

  async getDepth(index: number): Promise<DepthGrid | null> {
    return this.depths[index] ?? null;
  }
}

export function createUniformDepth(width: number, height: number, metres: number): DepthGrid {
  return { width, height, data: new Float32Array(width * height).fill(metres) };
}

import type { ImageFrame } from "@depthmark/view-core";

import type { FrameProvider } from "../TrackerPort";

export function createSolidFrame(width: number, height: number, shade: number): ImageFrame {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = shade;
    data[i + 1] = shade;
    data[i + 2] = shade;
    data[i + 3] = 255;
  }
  return { width, height, data };
}

/** Frames held in memory; `failing` indices reject like an undecodable frame. */
export class InMemoryFrameProvider implements FrameProvider {
  readonly requested: number[] = [];
  protected readonly frames: ImageFrame[];
  private readonly failing: ReadonlySet<number>;

  constructor(frames: ImageFrame[], options: { failing?: Iterable<number> } = {}) {
    this.frames = frames;
    this.failing = new Set(options.failing ?? []);
  }

  get frameCount(): number {
    return this.frames.length;
  }

  async getFrame(index: number): Promise<ImageFrame> {
    this.requested.push(index);
    const frame = this.frames[index];
    if (!frame || this.failing.has(index)) {
      throw new Error(`Frame ${index} could not be decoded`);
    }
    return frame;
  }
}

/** `count` solid frames whose shade equals their index, so scripts can tell them apart. */
export function createIndexedFrames(count: number, width = 8, height = 8): ImageFrame[] {
  const frames: ImageFrame[] = [];
  for (let i = 0; i < count; i += 1) {
    frames.push(createSolidFrame(width, height, i));
  }
  return frames;
}

import type { ImageFrame, Rect } from "@depthmark/view-core";

import type { TrackerHandle, TrackerKind, TrackerUpdate } from "../TrackerPort";

/** Decides the outcome of the n-th update (1-based) given the previous box. */
export type TrackerScript = (frame: ImageFrame, previous: Rect, call: number) => TrackerUpdate;

export class ScriptedTracker implements TrackerHandle {
  readonly kind: TrackerKind;
  readonly seenFrames: ImageFrame[] = [];
  private readonly script: TrackerScript;
  private readonly acceptInit: boolean;
  private rect: Rect | null = null;
  private calls = 0;

  constructor(script: TrackerScript, options: { kind?: TrackerKind; acceptInit?: boolean } = {}) {
    this.script = script;
    this.kind = options.kind ?? "csrt";
    this.acceptInit = options.acceptInit ?? true;
  }

  init(frame: ImageFrame, rect: Rect): boolean {
    void frame;
    if (!this.acceptInit || rect.w <= 0 || rect.h <= 0) {
      this.rect = null;
      return false;
    }
    this.rect = { ...rect };
    this.calls = 0;
    return true;
  }

  update(frame: ImageFrame): TrackerUpdate {
    if (!this.rect) {
      return { ok: false, reason: "not-initialized" };
    }
    this.calls += 1;
    this.seenFrames.push(frame);
    const result = this.script(frame, this.rect, this.calls);
    if (result.ok) {
      this.rect = { ...result.rect };
    }
    return result;
  }
}

export function shiftEachFrame(dx: number, dy: number): TrackerScript {
  return (_frame, previous) => ({
    ok: true,
    rect: { ...previous, x: previous.x + dx, y: previous.y + dy },
    score: 0
  });
}

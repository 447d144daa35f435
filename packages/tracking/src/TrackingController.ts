import type { ImageFrame, Rect } from "@depthmark/view-core";

import { DEFAULT_TRACKER_KIND, createTracker } from "./trackerFactory";
import type { FrameProvider, TrackerFactory, TrackerHandle, TrackerKind, TrackerUpdate } from "./TrackerPort";

export type TrackingFailureReason = "frame-unavailable" | "init-rejected" | "update-failed" | "aborted";

export type TrackingControllerOptions = {
  frames: FrameProvider;
  kind?: TrackerKind;
  createTracker?: TrackerFactory;
  /** Fired whenever tracking is switched off because something failed. */
  onTrackFailed?: (reason: TrackingFailureReason) => void;
  debug?: boolean;
};

export type AdvanceOptions = {
  /**
   * Signed number of frames to step. Defaults to `target - boundFrameIndex`;
   * pass it explicitly when navigation wrapped around the sequence end.
   */
  delta?: number;
  signal?: AbortSignal;
};

export type TrackerBinding = {
  readonly kind: TrackerKind;
  readonly boundFrameIndex: number;
  readonly boundRect: Rect;
  /** False once tracking was disabled; the bound frame and box stay as last known good. */
  readonly initialized: boolean;
};

type Bound = {
  kind: TrackerKind;
  frameIndex: number;
  rect: Rect;
};

export function wrapIndex(index: number, count: number): number {
  return ((index % count) + count) % count;
}

/**
 * Keeps one tracker bound to the frame its box is known on and walks it
 * frame by frame to wherever navigation goes. Any failure drops the tracker
 * but leaves the bound frame and box untouched.
 */
export class TrackingController {
  private frames: FrameProvider;
  private kind: TrackerKind;
  private readonly factory: TrackerFactory;
  private readonly onTrackFailed?: (reason: TrackingFailureReason) => void;
  private readonly debug: boolean;
  private tracker: TrackerHandle | null = null;
  private bound: Bound | null = null;
  private walk: AbortController | null = null;
  /** Bumped whenever the tracker is replaced or dropped; stale walks compare against it. */
  private generation = 0;

  constructor(options: TrackingControllerOptions) {
    this.frames = options.frames;
    this.kind = options.kind ?? DEFAULT_TRACKER_KIND;
    this.factory = options.createTracker ?? ((kind) => createTracker(kind));
    this.onTrackFailed = options.onTrackFailed;
    this.debug = options.debug ?? false;
  }

  get initialized(): boolean {
    return this.tracker !== null;
  }

  get isWalking(): boolean {
    return this.walk !== null;
  }

  get trackerKind(): TrackerKind {
    return this.kind;
  }

  getBinding(): TrackerBinding | null {
    const bound = this.bound;
    if (!bound) {
      return null;
    }
    return {
      kind: bound.kind,
      boundFrameIndex: bound.frameIndex,
      boundRect: { ...bound.rect },
      initialized: this.initialized
    };
  }

  /** Takes effect on the next `enable`. */
  setKind(kind: TrackerKind): void {
    this.kind = kind;
  }

  /** Replaces the frame supplier; an existing binding refers to the old frames and is dropped. */
  setFrames(frames: FrameProvider): void {
    this.reset();
    this.frames = frames;
  }

  async enable(frameIndex: number, rect: Rect): Promise<boolean> {
    this.disable();
    this.assertFrameIndex(frameIndex);
    const generation = this.generation;

    let frame: ImageFrame;
    try {
      frame = await this.frames.getFrame(frameIndex);
    } catch (error) {
      console.warn(`[TrackingController] Frame ${frameIndex} unavailable for init`, error);
      this.failIfCurrent(generation, "frame-unavailable");
      return false;
    }
    if (generation !== this.generation) {
      return false;
    }

    const tracker = this.factory(this.kind);
    let accepted = false;
    try {
      accepted = tracker.init(frame, rect);
    } catch (error) {
      console.error(`[TrackingController] ${tracker.kind} init threw`, error);
    }
    if (!accepted) {
      this.failIfCurrent(generation, "init-rejected");
      return false;
    }

    this.tracker = tracker;
    this.bound = { kind: tracker.kind, frameIndex, rect: { ...rect } };
    this.trace(`bound ${tracker.kind} tracker to frame ${frameIndex}`);
    return true;
  }

  /** User-initiated switch-off; does not count as a failure. */
  disable(): void {
    this.walk?.abort();
    this.walk = null;
    this.tracker = null;
    this.generation += 1;
  }

  /** Disables tracking and forgets the bound frame and box. */
  reset(): void {
    this.disable();
    this.bound = null;
  }

  /** Stops a walk in flight. The walk then fails with "aborted" and tracking is off. */
  cancel(): void {
    this.walk?.abort();
  }

  /**
   * Steps the tracker from its bound frame to `target`, one frame at a time.
   * Resolves to the box on `target`, or null when tracking failed or is off.
   */
  async advanceTo(target: number, options: AdvanceOptions = {}): Promise<Rect | null> {
    const tracker = this.tracker;
    const bound = this.bound;
    if (!tracker || !bound) {
      return null;
    }
    this.assertFrameIndex(target);
    const count = this.frames.frameCount;
    const delta = options.delta ?? target - bound.frameIndex;
    if (!Number.isInteger(delta) || wrapIndex(bound.frameIndex + delta, count) !== target) {
      throw new RangeError(`Delta ${delta} from frame ${bound.frameIndex} does not land on frame ${target}`);
    }
    if (delta === 0) {
      return { ...bound.rect };
    }
    if (this.walk) {
      // The running walk has already moved the tracker off its bound frame.
      this.fail("aborted");
      return null;
    }

    const generation = this.generation;
    const walk = new AbortController();
    this.walk = walk;
    const step = Math.sign(delta);
    const isCancelled = () => walk.signal.aborted || (options.signal?.aborted ?? false);

    try {
      let rect = bound.rect;
      for (let i = 1; i <= Math.abs(delta); i += 1) {
        const index = wrapIndex(bound.frameIndex + i * step, count);

        let frame: ImageFrame;
        try {
          frame = await this.frames.getFrame(index);
        } catch (error) {
          console.warn(`[TrackingController] Frame ${index} unavailable while tracking`, error);
          this.failIfCurrent(generation, "frame-unavailable");
          return null;
        }
        if (generation !== this.generation) {
          return null;
        }
        if (isCancelled()) {
          this.fail("aborted");
          return null;
        }

        const result = safeUpdate(tracker, frame);
        if (!result.ok) {
          this.trace(`lost target on frame ${index}: ${result.reason}`);
          this.fail("update-failed");
          return null;
        }
        rect = result.rect;
      }

      this.bound = { kind: tracker.kind, frameIndex: target, rect: { ...rect } };
      this.trace(`advanced ${Math.abs(delta)} frame(s) to ${target}`);
      return { ...rect };
    } finally {
      if (this.walk === walk) {
        this.walk = null;
      }
    }
  }

  private assertFrameIndex(index: number): void {
    const count = this.frames.frameCount;
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      throw new RangeError(`Frame index ${index} out of range [0, ${count})`);
    }
  }

  private failIfCurrent(generation: number, reason: TrackingFailureReason): void {
    if (generation === this.generation) {
      this.fail(reason);
    }
  }

  private fail(reason: TrackingFailureReason): void {
    this.disable();
    console.warn(`[TrackingController] Tracking disabled: ${reason}`);
    this.onTrackFailed?.(reason);
  }

  private trace(message: string): void {
    if (this.debug) {
      console.info(`[TrackingController] ${message}`);
    }
  }
}

function safeUpdate(tracker: TrackerHandle, frame: ImageFrame): TrackerUpdate {
  try {
    return tracker.update(frame);
  } catch (error) {
    console.error(`[TrackingController] ${tracker.kind} update threw`, error);
    return { ok: false, reason: "update-threw" };
  }
}

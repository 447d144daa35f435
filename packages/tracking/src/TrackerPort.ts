import type { ImageFrame, Rect } from "@depthmark/view-core";

export const TRACKER_KINDS = ["csrt", "kcf", "mosse"] as const;

export type TrackerKind = (typeof TRACKER_KINDS)[number];

export type TrackerUpdate =
  | {
      ok: true;
      rect: Rect;
      /** Normalized match cost, 0 for a perfect match. */
      score: number;
    }
  | {
      ok: false;
      reason: string;
    };

/** A single-object tracker bound to one target at a time. */
export interface TrackerHandle {
  readonly kind: TrackerKind;
  /** Returns false when the frame or rectangle cannot seed a track. */
  init(frame: ImageFrame, rect: Rect): boolean;
  update(frame: ImageFrame): TrackerUpdate;
}

export type TrackerFactory = (kind: TrackerKind) => TrackerHandle;

/** Random-access, possibly slow frame supplier. Rejects when a frame cannot be decoded. */
export interface FrameProvider {
  readonly frameCount: number;
  getFrame(index: number): Promise<ImageFrame>;
}

export function isTrackerKind(value: string): value is TrackerKind {
  return TRACKER_KINDS.some((kind) => kind === value);
}

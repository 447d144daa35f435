import { TrackingController, wrapIndex } from "@depthmark/tracking";
import type { TrackerFactory, TrackerKind, TrackingFailureReason } from "@depthmark/tracking";
import { SelectionEditor, ViewportTransform, computeCropWindow, isCanonicalZoom } from "@depthmark/view-core";
import type { CursorShape, ImageFrame, Point, Rect, SelectionOutcome, Size, ViewportState } from "@depthmark/view-core";

import { loadAnnotatorConfig } from "../config";
import type { AnnotatorConfig, AnnotatorConfigInput, DepthBand } from "../config";
import { cropDepthGrid, renderDepthColormap } from "../depth/depthColormap";
import type { RgbaImage } from "../depth/depthColormap";
import { computeDepthStats, normalizeDepthBand } from "../depth/depthStats";
import type { DepthGrid, DepthStatsResult } from "../depth/depthStats";
import type { FrameSource } from "../frames/FrameSource";

export type RedrawRequest = {
  frameIndex: number;
  frame: ImageFrame;
  viewport: ViewportState;
  /** The depth view zooms independently of the colour view. */
  depthViewport: ViewportState;
  /** Selection as drawn, in viewport pixels; null when none is visible. */
  selection: Rect | null;
  /** Committed area of interest in image pixels. */
  aoi: Rect | null;
  depthStats: DepthStatsResult | null;
  tracking: boolean;
};

export type NavigationResult =
  | {
      status: "moved";
      frameIndex: number;
      tracked: boolean;
    }
  | {
      status: "frame-unavailable";
      frameIndex: number;
    }
  | {
      status: "superseded";
    };

export type FrameNavigatorOptions = {
  frames: FrameSource;
  viewportSize: Size;
  /** Defaults to `viewportSize`. */
  depthViewportSize?: Size;
  config?: AnnotatorConfigInput;
  createTracker?: TrackerFactory;
  onCommit?: (rect: Rect, frameIndex: number) => void;
  onTrackFailed?: (reason: TrackingFailureReason) => void;
  onRedraw?: (request: RedrawRequest) => void;
};

type LoadedFrame = {
  index: number;
  frame: ImageFrame;
  depth: DepthGrid | null;
};

async function loadFrame(frames: FrameSource, index: number): Promise<LoadedFrame> {
  const [frame, depth] = await Promise.all([
    frames.getFrame(index),
    frames.getDepth(index).catch((error: unknown) => {
      console.warn(`[FrameNavigator] Depth for frame ${index} unavailable`, error);
      return null;
    })
  ]);
  return { index, frame, depth };
}

/**
 * Owns the current frame, the committed area of interest and the tracking
 * toggle, and keeps the viewport, selection editor and tracker in step as the
 * user moves through the sequence.
 */
export class FrameNavigator {
  private frames: FrameSource;
  private readonly config: AnnotatorConfig;
  private readonly options: FrameNavigatorOptions;
  private readonly viewport: ViewportTransform;
  private readonly depthViewport: ViewportTransform;
  private readonly editor: SelectionEditor;
  private readonly tracking: TrackingController;
  private current: LoadedFrame;
  private aoi: Rect | null = null;
  private stats: DepthStatsResult | null = null;
  private band: DepthBand;
  private trackingEnabled = false;
  private navigationRequest = 0;

  static async open(options: FrameNavigatorOptions, startIndex = 0): Promise<FrameNavigator> {
    const config = loadAnnotatorConfig(options.config ?? {});
    assertFrameIndex(startIndex, options.frames.frameCount);
    const loaded = await loadFrame(options.frames, startIndex);
    const navigator = new FrameNavigator(options, config, loaded);
    navigator.requestRedraw();
    return navigator;
  }

  private constructor(options: FrameNavigatorOptions, config: AnnotatorConfig, loaded: LoadedFrame) {
    this.options = options;
    this.config = config;
    this.frames = options.frames;
    this.current = loaded;
    this.band = { ...config.depthBand };
    this.viewport = new ViewportTransform(
      { width: loaded.frame.width, height: loaded.frame.height },
      options.viewportSize,
      { minZoom: config.zoom.minZoom, maxZoom: config.zoom.maxZoom }
    );
    const depthSize = loaded.depth && loaded.depth.width > 0 && loaded.depth.height > 0 ? loaded.depth : loaded.frame;
    this.depthViewport = new ViewportTransform(
      { width: depthSize.width, height: depthSize.height },
      options.depthViewportSize ?? options.viewportSize,
      { minZoom: config.zoom.minZoom, maxZoom: config.zoom.maxZoom }
    );
    this.editor = new SelectionEditor(this.viewport, config.selection);
    this.tracking = new TrackingController({
      frames: options.frames,
      kind: config.tracker.kind,
      createTracker: options.createTracker,
      debug: config.debug,
      onTrackFailed: (reason) => this.handleTrackFailed(reason)
    });
  }

  get currentIndex(): number {
    return this.current.index;
  }

  get frameCount(): number {
    return this.frames.frameCount;
  }

  get selection(): Rect | null {
    return this.aoi ? { ...this.aoi } : null;
  }

  get displayRect(): Rect | null {
    return this.editor.displayRect;
  }

  get depthStats(): DepthStatsResult | null {
    return this.stats;
  }

  get depthBand(): DepthBand {
    return { ...this.band };
  }

  get isTracking(): boolean {
    return this.trackingEnabled;
  }

  get trackerKind(): TrackerKind {
    return this.tracking.trackerKind;
  }

  get viewportState(): ViewportState {
    return this.viewport.state;
  }

  get depthViewportState(): ViewportState {
    return this.depthViewport.state;
  }

  // ============================================================================
  // Navigation
  // ============================================================================

  next(): Promise<NavigationResult> {
    return this.jump(1);
  }

  previous(): Promise<NavigationResult> {
    return this.jump(-1);
  }

  jumpForward(): Promise<NavigationResult> {
    return this.jump(this.config.navigation.jumpSize);
  }

  jumpBackward(): Promise<NavigationResult> {
    return this.jump(-this.config.navigation.jumpSize);
  }

  /** Moves by a signed number of frames, wrapping around either end. */
  jump(delta: number): Promise<NavigationResult> {
    if (!Number.isInteger(delta)) {
      throw new RangeError(`Jump must be a whole number of frames, got ${delta}`);
    }
    return this.goTo(wrapIndex(this.current.index + delta, this.frames.frameCount), delta);
  }

  /**
   * Shows frame `index`. With tracking on, the tracker walks from its bound
   * frame; `delta` tells it which way round the sequence to go.
   */
  async goTo(index: number, delta?: number): Promise<NavigationResult> {
    assertFrameIndex(index, this.frames.frameCount);
    this.navigationRequest += 1;
    const request = this.navigationRequest;
    const frames = this.frames;

    // The target is decoded before the tracker walks, so an unreadable target
    // leaves the frame, the AOI and tracking exactly as they were.
    let loaded: LoadedFrame;
    try {
      loaded = await loadFrame(frames, index);
    } catch (error) {
      console.warn(`[FrameNavigator] Frame ${index} unavailable`, error);
      return { status: "frame-unavailable", frameIndex: index };
    }
    if (request !== this.navigationRequest) {
      return { status: "superseded" };
    }

    let tracked: Rect | null = null;
    if (this.trackingEnabled && this.tracking.initialized) {
      tracked = await this.tracking.advanceTo(index, { delta: this.deltaFromBound(index, delta) });
      if (request !== this.navigationRequest) {
        return { status: "superseded" };
      }
    }

    this.current = loaded;
    this.viewport.setImageSize({ width: loaded.frame.width, height: loaded.frame.height });
    this.syncDepthViewport();
    if (tracked) {
      this.aoi = tracked;
    }
    this.refreshStats();
    this.editor.showImageRect(this.aoi);
    if (tracked) {
      this.options.onCommit?.({ ...tracked }, index);
    }
    this.trace(`showing frame ${index}${tracked ? " (tracked)" : ""}`);
    this.requestRedraw();
    return { status: "moved", frameIndex: index, tracked: tracked !== null };
  }

  /**
   * Points at a new sequence; the selection and any tracking are dropped. If
   * the start frame cannot be read the rejection surfaces and the current
   * sequence stays as it was.
   */
  async setFrameSource(frames: FrameSource, startIndex = 0): Promise<void> {
    assertFrameIndex(startIndex, frames.frameCount);
    const loaded = await loadFrame(frames, startIndex);

    this.navigationRequest += 1;
    this.trackingEnabled = false;
    this.tracking.setFrames(frames);
    this.frames = frames;
    this.current = loaded;
    this.aoi = null;
    this.stats = null;
    this.editor.clear();
    this.viewport.setImageSize({ width: loaded.frame.width, height: loaded.frame.height });
    this.viewport.reset();
    this.syncDepthViewport();
    this.depthViewport.reset();
    this.requestRedraw();
  }

  // ============================================================================
  // Selection
  // ============================================================================

  pointerDown(point: Point): void {
    this.editor.pointerDown(point);
    this.requestRedraw();
  }

  pointerMove(point: Point): void {
    if (this.editor.pointerMove(point)) {
      this.requestRedraw();
    }
  }

  /**
   * Finishes a gesture. A committed box replaces the area of interest and,
   * with tracking on, re-seeds the tracker on the current frame.
   */
  async pointerUp(point: Point): Promise<SelectionOutcome> {
    const outcome = this.editor.pointerUp(point);
    if (outcome.type !== "committed") {
      this.requestRedraw();
      return outcome;
    }

    const frameIndex = this.current.index;
    this.aoi = outcome.imageRect;
    this.refreshStats();
    this.editor.showImageRect(this.aoi);
    this.options.onCommit?.({ ...outcome.imageRect }, frameIndex);
    this.requestRedraw();

    if (this.trackingEnabled) {
      await this.tracking.enable(frameIndex, outcome.imageRect);
      this.requestRedraw();
    }
    return outcome;
  }

  cursorAt(point: Point): CursorShape {
    return this.editor.cursorAt(point);
  }

  clearSelection(): void {
    this.aoi = null;
    this.stats = null;
    this.editor.clear();
    this.trackingEnabled = false;
    this.tracking.reset();
    this.requestRedraw();
  }

  // ============================================================================
  // Tracking
  // ============================================================================

  /** Switching on needs an area of interest; resolves to whether tracking is now on. */
  async setTracking(enabled: boolean): Promise<boolean> {
    if (!enabled) {
      this.trackingEnabled = false;
      this.tracking.disable();
      this.requestRedraw();
      return false;
    }
    const aoi = this.aoi;
    if (!aoi) {
      return false;
    }
    this.trackingEnabled = true;
    const ok = await this.tracking.enable(this.current.index, aoi);
    this.requestRedraw();
    return ok && this.trackingEnabled;
  }

  async setTrackerKind(kind: TrackerKind): Promise<boolean> {
    this.tracking.setKind(kind);
    if (!this.trackingEnabled) {
      return false;
    }
    return this.setTracking(true);
  }

  // ============================================================================
  // Viewport
  // ============================================================================

  /** Wheel up (negative delta) zooms in by one step. Ignored mid-gesture. */
  wheel(deltaY: number, cursor: Point): boolean {
    if (deltaY === 0 || this.editor.isEditing) {
      return false;
    }
    const step = this.config.zoom.wheelStep;
    return this.zoomAt(deltaY < 0 ? step : 1 / step, cursor);
  }

  zoomAt(factor: number, cursor: Point): boolean {
    return this.afterViewportChange(this.viewport.zoomAt(factor, cursor));
  }

  panBy(delta: Point): boolean {
    return this.afterViewportChange(this.viewport.pan(delta));
  }

  resetZoom(): boolean {
    return this.afterViewportChange(this.viewport.reset());
  }

  resizeViewport(size: Size): boolean {
    return this.afterViewportChange(this.viewport.resize(size));
  }

  // ============================================================================
  // Depth
  // ============================================================================

  setDepthBand(minDepth: number, maxDepth: number): DepthBand {
    this.band = normalizeDepthBand(minDepth, maxDepth);
    this.refreshStats();
    this.requestRedraw();
    return { ...this.band };
  }

  /** Wheel up zooms the depth view in around `cursor`. */
  depthWheel(deltaY: number, cursor: Point): boolean {
    if (deltaY === 0) {
      return false;
    }
    const step = this.config.depthView.wheelStep;
    return this.zoomDepthAt(deltaY < 0 ? step : 1 / step, cursor);
  }

  zoomDepthAt(factor: number, cursor: Point): boolean {
    return this.afterDepthViewChange(this.depthViewport.zoomAt(factor, cursor));
  }

  panDepthBy(delta: Point): boolean {
    return this.afterDepthViewChange(this.depthViewport.pan(delta));
  }

  resetDepthZoom(): boolean {
    return this.afterDepthViewChange(this.depthViewport.reset());
  }

  resizeDepthViewport(size: Size): boolean {
    return this.afterDepthViewChange(this.depthViewport.resize(size));
  }

  /** Colormap of the part of the depth grid inside the depth view's crop window. */
  renderDepth(): RgbaImage | null {
    const depth = this.current.depth;
    if (!depth) {
      return null;
    }
    const state = this.depthViewport.state;
    const visible = isCanonicalZoom(state.zoom) ? depth : cropDepthGrid(depth, computeCropWindow(state));
    return renderDepthColormap(visible, this.band);
  }

  private afterDepthViewChange(changed: boolean): boolean {
    if (changed) {
      this.requestRedraw();
    }
    return changed;
  }

  private syncDepthViewport(): void {
    const depth = this.current.depth;
    if (depth && depth.width > 0 && depth.height > 0) {
      this.depthViewport.setImageSize({ width: depth.width, height: depth.height });
    }
  }

  private afterViewportChange(changed: boolean): boolean {
    if (changed) {
      this.editor.showImageRect(this.aoi);
      this.requestRedraw();
    }
    return changed;
  }

  private deltaFromBound(target: number, delta: number | undefined): number | undefined {
    const binding = this.tracking.getBinding();
    if (delta === undefined || !binding || binding.boundFrameIndex !== this.current.index) {
      return undefined;
    }
    return wrapIndex(binding.boundFrameIndex + delta, this.frames.frameCount) === target ? delta : undefined;
  }

  private refreshStats(): void {
    this.stats = this.aoi ? computeDepthStats(this.current.depth, this.aoi, this.band) : null;
  }

  private handleTrackFailed(reason: TrackingFailureReason): void {
    this.trackingEnabled = false;
    this.options.onTrackFailed?.(reason);
  }

  private requestRedraw(): void {
    this.options.onRedraw?.({
      frameIndex: this.current.index,
      frame: this.current.frame,
      viewport: this.viewport.state,
      depthViewport: this.depthViewport.state,
      selection: this.editor.displayRect,
      aoi: this.selection,
      depthStats: this.stats,
      tracking: this.trackingEnabled
    });
  }

  private trace(message: string): void {
    if (this.config.debug) {
      console.info(`[FrameNavigator] ${message}`);
    }
  }
}

function assertFrameIndex(index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new RangeError(`Frame index ${index} out of range [0, ${count})`);
  }
}

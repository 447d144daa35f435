import { describe, expect, it, vi } from "vitest";

import { ScriptedTracker, createIndexedFrames, shiftEachFrame } from "@depthmark/tracking";
import type { TrackerScript } from "@depthmark/tracking";
import type { Point } from "@depthmark/view-core";

import { formatDepthStats } from "../depth/depthStats";
import { InMemoryFrameSource, createUniformDepth } from "../mock/memoryFrameSource";
import { FrameNavigator } from "./FrameNavigator";

function failOnShade(shade: number): TrackerScript {
  return (frame, previous) =>
    frame.data[0] === shade
      ? { ok: false, reason: "occluded" }
      : { ok: true, rect: { ...previous, x: previous.x + 1 }, score: 0 };
}

// 20 frames of 200x100 shown in a 400x200 viewport: display = 2 x image.
function setup(script: TrackerScript = shiftEachFrame(2, 1), options: { failing?: number[] } = {}) {
  const depths = Array.from({ length: 20 }, (_, i) => (i === 3 ? null : createUniformDepth(200, 100, 2.5)));
  const frames = new InMemoryFrameSource(createIndexedFrames(20, 200, 100), depths, { failing: options.failing });
  const tracker = new ScriptedTracker(script);
  const createTracker = vi.fn(() => tracker);
  const onCommit = vi.fn();
  const onTrackFailed = vi.fn();
  const onRedraw = vi.fn();
  const open = (startIndex = 0) =>
    FrameNavigator.open(
      { frames, viewportSize: { width: 400, height: 200 }, createTracker, onCommit, onTrackFailed, onRedraw },
      startIndex
    );
  return { frames, tracker, createTracker, onCommit, onTrackFailed, onRedraw, open };
}

function drawBox(navigator: FrameNavigator, from: Point, to: Point) {
  navigator.pointerDown(from);
  navigator.pointerMove(to);
  return navigator.pointerUp(to);
}

function shadesSeenBy(tracker: ScriptedTracker): number[] {
  return tracker.seenFrames.map((frame) => frame.data[0] ?? -1);
}

describe("FrameNavigator", () => {
  it("opens on the requested frame with an empty selection", async () => {
    const { open, onRedraw } = setup();

    const navigator = await open();

    expect(navigator.currentIndex).toBe(0);
    expect(navigator.frameCount).toBe(20);
    expect(onRedraw).toHaveBeenCalledTimes(1);
    expect(onRedraw).toHaveBeenLastCalledWith(
      expect.objectContaining({ frameIndex: 0, selection: null, aoi: null, depthStats: null, tracking: false })
    );
  });

  it("commits drawn boxes in image pixels and measures depth inside them", async () => {
    const { open, onCommit } = setup();
    const navigator = await open();

    const outcome = await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });

    expect(outcome.type).toBe("committed");
    expect(navigator.selection).toEqual({ x: 10, y: 10, w: 40, h: 30 });
    expect(navigator.displayRect).toEqual({ x: 20, y: 20, w: 80, h: 60 });
    expect(onCommit).toHaveBeenCalledWith({ x: 10, y: 10, w: 40, h: 30 }, 0);
    expect(formatDepthStats(navigator.depthStats)).toBe("Mean: 2.50 m | Min: 2.50 | Max: 2.50 | Std: 0.00");
  });

  it("carries the box to the next frame while tracking", async () => {
    const { open, onCommit, onRedraw } = setup();
    const navigator = await open();
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });

    expect(await navigator.setTracking(true)).toBe(true);
    const result = await navigator.next();

    expect(result).toEqual({ status: "moved", frameIndex: 1, tracked: true });
    expect(navigator.selection).toEqual({ x: 12, y: 11, w: 40, h: 30 });
    expect(navigator.displayRect).toEqual({ x: 24, y: 22, w: 80, h: 60 });
    expect(onCommit).toHaveBeenLastCalledWith({ x: 12, y: 11, w: 40, h: 30 }, 1);
    expect(onRedraw).toHaveBeenLastCalledWith(
      expect.objectContaining({ frameIndex: 1, tracking: true, aoi: { x: 12, y: 11, w: 40, h: 30 } })
    );
  });

  it("keeps the last good box when tracking fails mid-jump", async () => {
    const { open, tracker, onTrackFailed } = setup(failOnShade(7));
    const navigator = await open(5);
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });
    await navigator.setTracking(true);

    const result = await navigator.jumpForward();

    expect(result).toEqual({ status: "moved", frameIndex: 10, tracked: false });
    expect(shadesSeenBy(tracker)).toEqual([6, 7]);
    expect(navigator.selection).toEqual({ x: 10, y: 10, w: 40, h: 30 });
    expect(navigator.isTracking).toBe(false);
    expect(onTrackFailed).toHaveBeenCalledWith("update-failed");
  });

  it("walks forward across the end of the sequence", async () => {
    const { open, tracker } = setup();
    const navigator = await open(18);
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });
    await navigator.setTracking(true);

    const result = await navigator.jumpForward();

    expect(result).toEqual({ status: "moved", frameIndex: 3, tracked: true });
    expect(shadesSeenBy(tracker)).toEqual([19, 0, 1, 2, 3]);
    expect(navigator.depthStats).toEqual({ ok: false, reason: "no-depth" });
  });

  it("steps back from the first frame to the last", async () => {
    const { open } = setup();
    const navigator = await open();

    expect(await navigator.previous()).toEqual({ status: "moved", frameIndex: 19, tracked: false });
  });

  it("re-seeds the tracker after a manual edit", async () => {
    const { open, createTracker } = setup();
    const navigator = await open();
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });
    await navigator.setTracking(true);

    await drawBox(navigator, { x: 200, y: 100 }, { x: 260, y: 160 });

    expect(createTracker).toHaveBeenCalledTimes(2);
    expect(navigator.isTracking).toBe(true);
    await navigator.next();
    expect(navigator.selection).toEqual({ x: 102, y: 51, w: 30, h: 30 });
  });

  it("refuses to track without a selection", async () => {
    const { open, createTracker, onTrackFailed } = setup();
    const navigator = await open();

    expect(await navigator.setTracking(true)).toBe(false);
    expect(navigator.isTracking).toBe(false);
    expect(createTracker).not.toHaveBeenCalled();
    expect(onTrackFailed).not.toHaveBeenCalled();
  });

  it("clears the selection and stops tracking", async () => {
    const { open } = setup();
    const navigator = await open();
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });
    await navigator.setTracking(true);

    navigator.clearSelection();

    expect(navigator.selection).toBeNull();
    expect(navigator.displayRect).toBeNull();
    expect(navigator.depthStats).toBeNull();
    expect(navigator.isTracking).toBe(false);
    expect(await navigator.next()).toEqual({ status: "moved", frameIndex: 1, tracked: false });
  });

  it("recomputes statistics when the depth band changes", async () => {
    const { open } = setup();
    const navigator = await open();
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });

    expect(navigator.setDepthBand(3, 2)).toEqual({ minDepth: 3, maxDepth: 4 });
    expect(formatDepthStats(navigator.depthStats)).toBe("Mean depth: - (no valid data)");

    navigator.setDepthBand(1, 20);
    expect(navigator.depthStats?.ok).toBe(true);
  });

  it("zooms with the wheel except during a gesture", async () => {
    const { open } = setup();
    const navigator = await open();

    expect(navigator.wheel(-120, { x: 200, y: 100 })).toBe(true);
    expect(navigator.viewportState.zoom).toBeCloseTo(1.2, 9);

    navigator.pointerDown({ x: 300, y: 150 });
    expect(navigator.wheel(-120, { x: 200, y: 100 })).toBe(false);
  });

  it("hides the box outside the crop but keeps it in image space", async () => {
    const { open } = setup();
    const navigator = await open();
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });

    navigator.zoomAt(2, { x: 200, y: 100 });
    expect(navigator.displayRect).toBeNull();
    expect(navigator.selection).toEqual({ x: 10, y: 10, w: 40, h: 30 });

    navigator.resetZoom();
    expect(navigator.displayRect).toEqual({ x: 20, y: 20, w: 80, h: 60 });
  });

  it("stays on the current frame when the target cannot be decoded", async () => {
    const { open, tracker } = setup(shiftEachFrame(2, 1), { failing: [4] });
    const navigator = await open();
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });
    await navigator.setTracking(true);

    expect(await navigator.goTo(4)).toEqual({ status: "frame-unavailable", frameIndex: 4 });
    expect(navigator.currentIndex).toBe(0);
    expect(navigator.isTracking).toBe(true);
    expect(tracker.seenFrames).toHaveLength(0);
  });

  it("drops a navigation overtaken by a newer one", async () => {
    const { open } = setup();
    const navigator = await open();

    const first = navigator.goTo(4);
    const second = navigator.goTo(6);

    expect(await first).toEqual({ status: "superseded" });
    expect(await second).toEqual({ status: "moved", frameIndex: 6, tracked: false });
    expect(navigator.currentIndex).toBe(6);
  });

  it("renders depth only where the frame has it", async () => {
    const { open } = setup();
    const navigator = await open();

    const image = navigator.renderDepth();
    expect(image?.width).toBe(200);
    expect(image?.height).toBe(100);

    await navigator.goTo(3);
    expect(navigator.renderDepth()).toBeNull();
  });

  it("starts over when the frame source is replaced", async () => {
    const { open } = setup();
    const navigator = await open();
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });
    await navigator.setTracking(true);

    await navigator.setFrameSource(new InMemoryFrameSource(createIndexedFrames(5, 100, 50)));

    expect(navigator.currentIndex).toBe(0);
    expect(navigator.frameCount).toBe(5);
    expect(navigator.selection).toBeNull();
    expect(navigator.isTracking).toBe(false);
    expect(navigator.viewportState.imageSize).toEqual({ width: 100, height: 50 });
  });

  it("keeps the current sequence when the new one cannot be opened", async () => {
    const { open } = setup();
    const navigator = await open(15);
    await drawBox(navigator, { x: 20, y: 20 }, { x: 100, y: 80 });
    await navigator.setTracking(true);

    const broken = new InMemoryFrameSource(createIndexedFrames(5, 100, 50), [], { failing: [0] });
    await expect(navigator.setFrameSource(broken)).rejects.toThrow("Frame 0 could not be decoded");

    expect(navigator.currentIndex).toBe(15);
    expect(navigator.frameCount).toBe(20);
    expect(navigator.selection).toEqual({ x: 10, y: 10, w: 40, h: 30 });
    expect(navigator.displayRect).toEqual({ x: 20, y: 20, w: 80, h: 60 });
    expect(navigator.isTracking).toBe(true);
    expect(await navigator.next()).toEqual({ status: "moved", frameIndex: 16, tracked: true });
  });

  it("zooms the depth view on its own and renders only its crop", async () => {
    const { open } = setup();
    const navigator = await open();

    expect(navigator.zoomDepthAt(2, { x: 200, y: 100 })).toBe(true);

    expect(navigator.viewportState.zoom).toBe(1);
    expect(navigator.depthViewportState.focus).toEqual({ x: 100, y: 50 });
    const image = navigator.renderDepth();
    expect(image?.width).toBe(100);
    expect(image?.height).toBe(50);

    expect(navigator.depthWheel(120, { x: 200, y: 100 })).toBe(true);
    expect(navigator.depthViewportState.zoom).toBeCloseTo(2 / 1.1, 9);
    expect(navigator.resetDepthZoom()).toBe(true);
    expect(navigator.renderDepth()?.width).toBe(200);
  });
});

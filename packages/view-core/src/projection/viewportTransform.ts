import { clamp, intersectRects } from "../geometry/rect";
import type { Point, Rect, Size } from "../types/geometry";

export type ViewportState = {
  zoom: number;
  /** Image-space point the crop window is centred on. */
  focus: Point;
  viewportSize: Size;
  imageSize: Size;
};

export type ZoomLimits = {
  minZoom: number;
  maxZoom: number;
};

/** Where the (cropped) image lands inside the viewport after letterboxing. */
export type DisplayRegion = {
  offsetX: number;
  offsetY: number;
  width: number;
  height: number;
};

export const DEFAULT_ZOOM_LIMITS: ZoomLimits = {
  minZoom: 1,
  maxZoom: 10
};

const ZOOM_EPSILON = 1e-9;

function assertPositiveSize(size: Size, label: string): void {
  if (!(size.width > 0 && size.height > 0) || !Number.isFinite(size.width) || !Number.isFinite(size.height)) {
    throw new RangeError(`${label} size must be positive, got ${size.width}x${size.height}`);
  }
}

function assertZoomLimits(limits: ZoomLimits): void {
  if (!(limits.minZoom >= 1) || !(limits.maxZoom >= limits.minZoom)) {
    throw new RangeError(`Invalid zoom limits [${limits.minZoom}, ${limits.maxZoom}]`);
  }
}

function imageCenter(imageSize: Size): Point {
  return { x: imageSize.width / 2, y: imageSize.height / 2 };
}

export function isCanonicalZoom(zoom: number): boolean {
  return zoom <= 1 + ZOOM_EPSILON;
}

export function clampZoom(zoom: number, limits: ZoomLimits = DEFAULT_ZOOM_LIMITS): number {
  const bounded = clamp(zoom, limits.minZoom, limits.maxZoom);
  return isCanonicalZoom(bounded) ? 1 : bounded;
}

function clampFocus(focus: Point, zoom: number, imageSize: Size): Point {
  if (isCanonicalZoom(zoom)) {
    return imageCenter(imageSize);
  }
  const halfW = imageSize.width / zoom / 2;
  const halfH = imageSize.height / zoom / 2;
  return {
    x: clamp(focus.x, halfW, imageSize.width - halfW),
    y: clamp(focus.y, halfH, imageSize.height - halfH)
  };
}

export function createViewportState(imageSize: Size, viewportSize: Size): ViewportState {
  assertPositiveSize(imageSize, "Image");
  assertPositiveSize(viewportSize, "Viewport");
  return {
    zoom: 1,
    focus: imageCenter(imageSize),
    viewportSize: { ...viewportSize },
    imageSize: { ...imageSize }
  };
}

/**
 * Aspect-preserving fit of the image into the viewport. The crop window always
 * has the image's aspect ratio, so the region does not depend on zoom.
 */
export function computeDisplayRegion(state: ViewportState): DisplayRegion {
  const { imageSize, viewportSize } = state;
  const imageAspect = imageSize.width / imageSize.height;
  const viewportAspect = viewportSize.width / viewportSize.height;

  if (viewportAspect > imageAspect) {
    const height = viewportSize.height;
    const width = (height * imageSize.width) / imageSize.height;
    return { offsetX: (viewportSize.width - width) / 2, offsetY: 0, width, height };
  }

  const width = viewportSize.width;
  const height = (width * imageSize.height) / imageSize.width;
  return { offsetX: 0, offsetY: (viewportSize.height - height) / 2, width, height };
}

export function computeCropWindow(state: ViewportState): Rect {
  const { imageSize, zoom, focus } = state;
  if (isCanonicalZoom(zoom)) {
    return { x: 0, y: 0, w: imageSize.width, h: imageSize.height };
  }
  const w = imageSize.width / zoom;
  const h = imageSize.height / zoom;
  return {
    x: clamp(focus.x - w / 2, 0, imageSize.width - w),
    y: clamp(focus.y - h / 2, 0, imageSize.height - h),
    w,
    h
  };
}

/** Unclamped: points over the letterbox map outside the image. */
export function displayPointToImage(state: ViewportState, point: Point): Point {
  const crop = computeCropWindow(state);
  const region = computeDisplayRegion(state);
  const scale = crop.w / region.width;
  return {
    x: crop.x + (point.x - region.offsetX) * scale,
    y: crop.y + (point.y - region.offsetY) * scale
  };
}

export function imagePointToDisplay(state: ViewportState, point: Point): Point {
  const crop = computeCropWindow(state);
  const region = computeDisplayRegion(state);
  const scale = region.width / crop.w;
  return {
    x: region.offsetX + (point.x - crop.x) * scale,
    y: region.offsetY + (point.y - crop.y) * scale
  };
}

/**
 * Projects an image-space rectangle into viewport pixels. Only the part inside
 * the crop window is drawn; returns null when nothing of it is visible.
 */
export function imageToDisplay(state: ViewportState, rect: Rect): Rect | null {
  const crop = computeCropWindow(state);
  const visible = intersectRects(rect, crop);
  if (!visible) {
    return null;
  }
  const region = computeDisplayRegion(state);
  const scale = region.width / crop.w;
  return {
    x: region.offsetX + (visible.x - crop.x) * scale,
    y: region.offsetY + (visible.y - crop.y) * scale,
    w: visible.w * scale,
    h: visible.h * scale
  };
}

/** Inverse of imageToDisplay, clamped to the image bounds. */
export function displayToImage(state: ViewportState, rect: Rect): Rect {
  const { imageSize } = state;
  const topLeft = displayPointToImage(state, { x: rect.x, y: rect.y });
  const bottomRight = displayPointToImage(state, { x: rect.x + rect.w, y: rect.y + rect.h });
  const x1 = clamp(topLeft.x, 0, imageSize.width);
  const y1 = clamp(topLeft.y, 0, imageSize.height);
  const x2 = clamp(bottomRight.x, 0, imageSize.width);
  const y2 = clamp(bottomRight.y, 0, imageSize.height);
  return { x: x1, y: y1, w: Math.max(0, x2 - x1), h: Math.max(0, y2 - y1) };
}

/**
 * Multiplies the zoom by `factor`, keeping the image point under `cursor` at the
 * same relative position in the display region. Points over the letterbox are
 * anchored the same way; the focus clamp may then move them.
 */
export function zoomAt(
  state: ViewportState,
  factor: number,
  cursor: Point,
  limits: ZoomLimits = DEFAULT_ZOOM_LIMITS
): ViewportState {
  if (!(factor > 0) || !Number.isFinite(factor)) {
    throw new RangeError(`Zoom factor must be a positive finite number, got ${factor}`);
  }
  assertZoomLimits(limits);

  const nextZoom = clampZoom(state.zoom * factor, limits);
  if (nextZoom === state.zoom) {
    return state;
  }
  if (isCanonicalZoom(nextZoom)) {
    return { ...state, zoom: 1, focus: imageCenter(state.imageSize) };
  }

  const anchor = displayPointToImage(state, cursor);
  const region = computeDisplayRegion(state);
  const normX = (cursor.x - region.offsetX) / region.width;
  const normY = (cursor.y - region.offsetY) / region.height;
  const cropW = state.imageSize.width / nextZoom;
  const cropH = state.imageSize.height / nextZoom;

  const focus = {
    x: anchor.x - normX * cropW + cropW / 2,
    y: anchor.y - normY * cropH + cropH / 2
  };
  return { ...state, zoom: nextZoom, focus: clampFocus(focus, nextZoom, state.imageSize) };
}

/** Moves the focus against a display-space drag, scaled by 1/zoom. No-op at canonical zoom. */
export function pan(state: ViewportState, delta: Point): ViewportState {
  if (isCanonicalZoom(state.zoom)) {
    return state;
  }
  const focus = {
    x: state.focus.x - delta.x / state.zoom,
    y: state.focus.y - delta.y / state.zoom
  };
  return { ...state, focus: clampFocus(focus, state.zoom, state.imageSize) };
}

export function resizeViewport(state: ViewportState, viewportSize: Size): ViewportState {
  assertPositiveSize(viewportSize, "Viewport");
  return { ...state, viewportSize: { ...viewportSize } };
}

/** A frame of different dimensions starts over at canonical zoom. */
export function setImageSize(state: ViewportState, imageSize: Size): ViewportState {
  if (imageSize.width === state.imageSize.width && imageSize.height === state.imageSize.height) {
    return state;
  }
  return createViewportState(imageSize, state.viewportSize);
}

export function resetZoom(state: ViewportState): ViewportState {
  if (state.zoom === 1) {
    return state;
  }
  return { ...state, zoom: 1, focus: imageCenter(state.imageSize) };
}

/** Mutable holder around the pure transform functions. */
export class ViewportTransform {
  private current: ViewportState;
  private limits: ZoomLimits;

  constructor(imageSize: Size, viewportSize: Size, limits: ZoomLimits = DEFAULT_ZOOM_LIMITS) {
    assertZoomLimits(limits);
    this.limits = { ...limits };
    this.current = createViewportState(imageSize, viewportSize);
  }

  get state(): ViewportState {
    return this.current;
  }

  get zoom(): number {
    return this.current.zoom;
  }

  zoomAt(factor: number, cursor: Point): boolean {
    const next = zoomAt(this.current, factor, cursor, this.limits);
    return this.commit(next);
  }

  pan(delta: Point): boolean {
    return this.commit(pan(this.current, delta));
  }

  resize(viewportSize: Size): boolean {
    return this.commit(resizeViewport(this.current, viewportSize));
  }

  setImageSize(imageSize: Size): boolean {
    return this.commit(setImageSize(this.current, imageSize));
  }

  reset(): boolean {
    return this.commit(resetZoom(this.current));
  }

  imageToDisplay(rect: Rect): Rect | null {
    return imageToDisplay(this.current, rect);
  }

  displayToImage(rect: Rect): Rect {
    return displayToImage(this.current, rect);
  }

  displayPointToImage(point: Point): Point {
    return displayPointToImage(this.current, point);
  }

  private commit(next: ViewportState): boolean {
    const changed = next !== this.current;
    this.current = next;
    return changed;
  }
}

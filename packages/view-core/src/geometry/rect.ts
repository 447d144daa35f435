import type { Point, Rect, Size } from "../types/geometry";

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function rectRight(rect: Rect): number {
  return rect.x + rect.w;
}

export function rectBottom(rect: Rect): number {
  return rect.y + rect.h;
}

export function isDegenerate(rect: Rect): boolean {
  return !(rect.w > 0 && rect.h > 0);
}

export function containsPoint(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x <= rectRight(rect) &&
    point.y >= rect.y &&
    point.y <= rectBottom(rect)
  );
}

/** Rectangle spanned by two corners, in any order. */
export function rectFromCorners(a: Point, b: Point): Rect {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return { x, y, w: Math.abs(b.x - a.x), h: Math.abs(b.y - a.y) };
}

export function clampPoint(point: Point, bounds: Size): Point {
  return {
    x: clamp(point.x, 0, bounds.width),
    y: clamp(point.y, 0, bounds.height)
  };
}

/** Clamps each edge independently; the rectangle may shrink. */
export function clampRectEdges(rect: Rect, bounds: Size): Rect {
  const x1 = clamp(rect.x, 0, bounds.width);
  const y1 = clamp(rect.y, 0, bounds.height);
  const x2 = clamp(rectRight(rect), 0, bounds.width);
  const y2 = clamp(rectBottom(rect), 0, bounds.height);
  return { x: x1, y: y1, w: Math.max(0, x2 - x1), h: Math.max(0, y2 - y1) };
}

/** Shifts the rectangle back inside the bounds, keeping its size where it fits. */
export function shiftRectInside(rect: Rect, bounds: Size): Rect {
  const w = Math.min(rect.w, bounds.width);
  const h = Math.min(rect.h, bounds.height);
  return {
    x: clamp(rect.x, 0, bounds.width - w),
    y: clamp(rect.y, 0, bounds.height - h),
    w,
    h
  };
}

export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x1 = Math.max(a.x, b.x);
  const y1 = Math.max(a.y, b.y);
  const x2 = Math.min(rectRight(a), rectRight(b));
  const y2 = Math.min(rectBottom(a), rectBottom(b));
  if (x2 <= x1 || y2 <= y1) {
    return null;
  }
  return { x: x1, y: y1, w: x2 - x1, h: y2 - y1 };
}

/** Snaps both corners to whole pixels so adjacent rectangles never overlap by rounding. */
export function roundRect(rect: Rect): Rect {
  const x1 = Math.round(rect.x);
  const y1 = Math.round(rect.y);
  const x2 = Math.round(rectRight(rect));
  const y2 = Math.round(rectBottom(rect));
  return { x: x1, y: y1, w: x2 - x1, h: y2 - y1 };
}

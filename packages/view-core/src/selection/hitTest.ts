import { containsPoint, rectBottom, rectRight } from "../geometry/rect";
import type { Point, Rect } from "../types/geometry";
import type { CursorShape, ResizeHandle } from "./types";

type Candidate = {
  handle: ResizeHandle;
  distance: number;
};

function nearest(candidates: Candidate[], threshold: number): ResizeHandle | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (candidate.distance > threshold) {
      continue;
    }
    if (!best || candidate.distance < best.distance) {
      best = candidate;
    }
  }
  return best ? best.handle : null;
}

/**
 * Corners win over edges. Corners are measured by Manhattan distance; an edge
 * only counts while the pointer lies within the edge's span.
 */
export function hitTestHandle(point: Point, rect: Rect, threshold: number): ResizeHandle | null {
  const left = rect.x;
  const top = rect.y;
  const right = rectRight(rect);
  const bottom = rectBottom(rect);
  const manhattan = (x: number, y: number) => Math.abs(point.x - x) + Math.abs(point.y - y);

  const corner = nearest(
    [
      { handle: "tl", distance: manhattan(left, top) },
      { handle: "tr", distance: manhattan(right, top) },
      { handle: "bl", distance: manhattan(left, bottom) },
      { handle: "br", distance: manhattan(right, bottom) }
    ],
    threshold
  );
  if (corner) {
    return corner;
  }

  const withinX = point.x >= left && point.x <= right;
  const withinY = point.y >= top && point.y <= bottom;
  const edges: Candidate[] = [];
  if (withinY) {
    edges.push({ handle: "l", distance: Math.abs(point.x - left) });
    edges.push({ handle: "r", distance: Math.abs(point.x - right) });
  }
  if (withinX) {
    edges.push({ handle: "t", distance: Math.abs(point.y - top) });
    edges.push({ handle: "b", distance: Math.abs(point.y - bottom) });
  }
  return nearest(edges, threshold);
}

const HANDLE_CURSORS: Record<ResizeHandle, CursorShape> = {
  tl: "nwse-resize",
  br: "nwse-resize",
  tr: "nesw-resize",
  bl: "nesw-resize",
  l: "ew-resize",
  r: "ew-resize",
  t: "ns-resize",
  b: "ns-resize"
};

export function cursorForHandle(handle: ResizeHandle): CursorShape {
  return HANDLE_CURSORS[handle];
}

export function hoverCursor(point: Point, rect: Rect | null, threshold: number): CursorShape {
  if (!rect) {
    return "default";
  }
  const handle = hitTestHandle(point, rect, threshold);
  if (handle) {
    return cursorForHandle(handle);
  }
  return containsPoint(rect, point) ? "move" : "default";
}

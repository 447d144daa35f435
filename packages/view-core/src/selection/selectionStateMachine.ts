import {
  clampPoint,
  clampRectEdges,
  containsPoint,
  isDegenerate,
  rectBottom,
  rectFromCorners,
  rectRight,
  shiftRectInside
} from "../geometry/rect";
import type { Point, Rect, Size } from "../types/geometry";
import { DEFAULT_SELECTION_CONFIG } from "./config";
import { hitTestHandle } from "./hitTest";
import type { ResizeHandle, SelectionConfig, SelectionEventDTO, SelectionOutput, SelectionState } from "./types";

type HandleEdges = {
  left: boolean;
  right: boolean;
  top: boolean;
  bottom: boolean;
};

const HANDLE_EDGES: Record<ResizeHandle, HandleEdges> = {
  tl: { left: true, right: false, top: true, bottom: false },
  tr: { left: false, right: true, top: true, bottom: false },
  bl: { left: true, right: false, top: false, bottom: true },
  br: { left: false, right: true, top: false, bottom: true },
  l: { left: true, right: false, top: false, bottom: false },
  r: { left: false, right: true, top: false, bottom: false },
  t: { left: false, right: false, top: true, bottom: false },
  b: { left: false, right: false, top: false, bottom: true }
};

const MIRROR_HORIZONTAL: Record<ResizeHandle, ResizeHandle> = {
  tl: "tr",
  tr: "tl",
  bl: "br",
  br: "bl",
  l: "r",
  r: "l",
  t: "t",
  b: "b"
};

const MIRROR_VERTICAL: Record<ResizeHandle, ResizeHandle> = {
  tl: "bl",
  tr: "br",
  bl: "tl",
  br: "tr",
  l: "l",
  r: "r",
  t: "b",
  b: "t"
};

export function createSelectionState(bounds: Size): SelectionState {
  return { mode: { status: "idle" }, rect: null, committedRect: null, bounds: { ...bounds } };
}

function resizeRect(rect: Rect, handle: ResizeHandle, point: Point): { rect: Rect; handle: ResizeHandle } {
  const edges = HANDLE_EDGES[handle];
  let left = rect.x;
  let right = rectRight(rect);
  let top = rect.y;
  let bottom = rectBottom(rect);

  if (edges.left) {
    left = point.x;
  }
  if (edges.right) {
    right = point.x;
  }
  if (edges.top) {
    top = point.y;
  }
  if (edges.bottom) {
    bottom = point.y;
  }

  // Dragging past the opposite edge swaps the grabbed side.
  let nextHandle = handle;
  if (left > right) {
    [left, right] = [right, left];
    nextHandle = MIRROR_HORIZONTAL[nextHandle];
  }
  if (top > bottom) {
    [top, bottom] = [bottom, top];
    nextHandle = MIRROR_VERTICAL[nextHandle];
  }

  return { rect: { x: left, y: top, w: right - left, h: bottom - top }, handle: nextHandle };
}

export function reduceSelection(
  state: SelectionState,
  event: SelectionEventDTO,
  config: SelectionConfig = DEFAULT_SELECTION_CONFIG
): SelectionOutput {
  if (event.type === "CLEAR") {
    return { state: createSelectionState(state.bounds) };
  }

  if (event.type === "SET_BOUNDS") {
    const clampOrNull = (rect: Rect | null) => {
      if (!rect) {
        return null;
      }
      const clamped = clampRectEdges(rect, event.bounds);
      return isDegenerate(clamped) ? null : clamped;
    };
    return {
      state: {
        ...state,
        bounds: { ...event.bounds },
        rect: clampOrNull(state.rect),
        committedRect: clampOrNull(state.committedRect)
      }
    };
  }

  if (event.type === "SET_RECT") {
    // Programmatic updates never interrupt a gesture in progress.
    if (state.mode.status !== "idle") {
      return { state };
    }
    const rect = event.rect ? { ...event.rect } : null;
    return { state: { ...state, rect, committedRect: rect } };
  }

  const point = clampPoint(event.point, state.bounds);

  if (event.type === "POINTER_DOWN") {
    if (state.mode.status !== "idle") {
      return { state };
    }
    const current = state.rect;
    if (current) {
      const handle = hitTestHandle(event.point, current, config.handleThreshold);
      if (handle) {
        return { state: { ...state, mode: { status: "resizing", handle } } };
      }
      if (containsPoint(current, event.point)) {
        return { state: { ...state, mode: { status: "moving", lastPointer: point } } };
      }
    }
    return {
      state: {
        ...state,
        mode: { status: "creating", anchor: point },
        rect: { x: point.x, y: point.y, w: 0, h: 0 }
      }
    };
  }

  if (event.type === "POINTER_MOVE") {
    const mode = state.mode;
    if (mode.status === "creating") {
      const rect = clampRectEdges(rectFromCorners(mode.anchor, point), state.bounds);
      return { state: { ...state, rect } };
    }
    if (mode.status === "moving" && state.rect) {
      const moved = {
        ...state.rect,
        x: state.rect.x + point.x - mode.lastPointer.x,
        y: state.rect.y + point.y - mode.lastPointer.y
      };
      return {
        state: {
          ...state,
          mode: { status: "moving", lastPointer: point },
          rect: shiftRectInside(moved, state.bounds)
        }
      };
    }
    if (mode.status === "resizing" && state.rect) {
      const resized = resizeRect(state.rect, mode.handle, point);
      return {
        state: {
          ...state,
          mode: { status: "resizing", handle: resized.handle },
          rect: clampRectEdges(resized.rect, state.bounds)
        }
      };
    }
    return { state };
  }

  // POINTER_UP
  if (state.mode.status === "idle") {
    return { state };
  }
  const released = reduceSelection(state, { type: "POINTER_MOVE", point: event.point }, config).state;
  const rect = released.rect;
  if (!rect || isDegenerate(rect)) {
    return {
      state: { ...released, mode: { status: "idle" }, rect: released.committedRect },
      discarded: true
    };
  }
  return {
    state: { ...released, mode: { status: "idle" }, rect, committedRect: rect },
    committed: rect
  };
}

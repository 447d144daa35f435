import type { Point, Rect, Size } from "../types/geometry";

export type ResizeHandle = "tl" | "tr" | "bl" | "br" | "l" | "r" | "t" | "b";

export type CursorShape = "nwse-resize" | "nesw-resize" | "ew-resize" | "ns-resize" | "move" | "default";

export type SelectionEventDTO =
  | {
      type: "POINTER_DOWN";
      point: Point;
    }
  | {
      type: "POINTER_MOVE";
      point: Point;
    }
  | {
      type: "POINTER_UP";
      point: Point;
    }
  | {
      type: "SET_RECT";
      rect: Rect | null;
    }
  | {
      type: "SET_BOUNDS";
      bounds: Size;
    }
  | {
      type: "CLEAR";
    };

export type EditMode =
  | {
      status: "idle";
    }
  | {
      status: "creating";
      anchor: Point;
    }
  | {
      status: "moving";
      lastPointer: Point;
    }
  | {
      status: "resizing";
      handle: ResizeHandle;
    };

export type SelectionState = {
  mode: EditMode;
  /** Rectangle as currently drawn, in display coordinates. */
  rect: Rect | null;
  /** Last committed rectangle; restored when a gesture ends with zero area. */
  committedRect: Rect | null;
  /** Display area the rectangle must stay inside. */
  bounds: Size;
};

export type SelectionConfig = {
  /** Distance in display pixels within which a corner or edge is grabbed. */
  handleThreshold: number;
};

export type SelectionOutput = {
  state: SelectionState;
  committed?: Rect;
  discarded?: boolean;
};

import { isDegenerate, roundRect } from "../geometry/rect";
import type { ViewportTransform } from "../projection/viewportTransform";
import type { Point, Rect } from "../types/geometry";
import { resolveSelectionConfig } from "./config";
import { hoverCursor } from "./hitTest";
import { createSelectionState, reduceSelection } from "./selectionStateMachine";
import type { CursorShape, EditMode, SelectionConfig, SelectionEventDTO, SelectionOutput, SelectionState } from "./types";

export type SelectionOutcome =
  | {
      type: "none";
    }
  | {
      type: "committed";
      /** Whole-pixel rectangle in image coordinates. */
      imageRect: Rect;
      displayRect: Rect;
    }
  | {
      type: "discarded";
    };

/**
 * Drives the selection reducer with display-space pointer input and converts
 * committed rectangles into image pixels through the shared viewport.
 */
export class SelectionEditor {
  private state: SelectionState;
  private readonly config: SelectionConfig;
  private readonly viewport: ViewportTransform;

  constructor(viewport: ViewportTransform, config?: Partial<SelectionConfig>) {
    this.viewport = viewport;
    this.config = resolveSelectionConfig(config);
    this.state = createSelectionState(viewport.state.viewportSize);
  }

  get mode(): EditMode {
    return this.state.mode;
  }

  get isEditing(): boolean {
    return this.state.mode.status !== "idle";
  }

  get displayRect(): Rect | null {
    return this.state.rect;
  }

  pointerDown(point: Point): void {
    this.dispatch({ type: "POINTER_DOWN", point });
  }

  /** Returns true while a gesture is reshaping the rectangle. */
  pointerMove(point: Point): boolean {
    if (!this.isEditing) {
      return false;
    }
    this.dispatch({ type: "POINTER_MOVE", point });
    return true;
  }

  pointerUp(point: Point): SelectionOutcome {
    const previous = this.state.committedRect;
    const output = this.dispatch({ type: "POINTER_UP", point });
    if (output.discarded) {
      return { type: "discarded" };
    }
    if (!output.committed) {
      return { type: "none" };
    }

    const imageRect = roundRect(this.viewport.displayToImage(output.committed));
    if (isDegenerate(imageRect)) {
      // Drawn entirely over the letterbox, or thinner than one image pixel.
      this.state = { ...this.state, rect: previous, committedRect: previous };
      return { type: "discarded" };
    }
    return { type: "committed", imageRect, displayRect: output.committed };
  }

  /** Re-projects an image-space rectangle after the viewport or the frame changed. */
  showImageRect(rect: Rect | null): void {
    this.syncBounds();
    const displayRect = rect ? this.viewport.imageToDisplay(rect) : null;
    this.dispatch({ type: "SET_RECT", rect: displayRect });
  }

  syncBounds(): void {
    const { viewportSize } = this.viewport.state;
    const { bounds } = this.state;
    if (bounds.width !== viewportSize.width || bounds.height !== viewportSize.height) {
      this.dispatch({ type: "SET_BOUNDS", bounds: viewportSize });
    }
  }

  clear(): void {
    this.dispatch({ type: "CLEAR" });
  }

  cursorAt(point: Point): CursorShape {
    return hoverCursor(point, this.state.rect, this.config.handleThreshold);
  }

  private dispatch(event: SelectionEventDTO): SelectionOutput {
    const output = reduceSelection(this.state, event, this.config);
    this.state = output.state;
    return output;
  }
}

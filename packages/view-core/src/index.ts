export type { Point, Rect, Size } from "./types/geometry";
export type { ImageFrame } from "./types/frame";
export { isValidFrame } from "./types/frame";
export {
  clamp,
  clampRectEdges,
  containsPoint,
  intersectRects,
  isDegenerate,
  rectFromCorners,
  roundRect,
  shiftRectInside
} from "./geometry/rect";
export type { DisplayRegion, ViewportState, ZoomLimits } from "./projection/viewportTransform";
export {
  DEFAULT_ZOOM_LIMITS,
  ViewportTransform,
  clampZoom,
  computeCropWindow,
  computeDisplayRegion,
  createViewportState,
  displayPointToImage,
  displayToImage,
  imagePointToDisplay,
  imageToDisplay,
  isCanonicalZoom,
  pan,
  resetZoom,
  resizeViewport,
  setImageSize,
  zoomAt
} from "./projection/viewportTransform";
export type {
  CursorShape,
  EditMode,
  ResizeHandle,
  SelectionConfig,
  SelectionEventDTO,
  SelectionOutput,
  SelectionState
} from "./selection/types";
export { DEFAULT_SELECTION_CONFIG, resolveSelectionConfig } from "./selection/config";
export { cursorForHandle, hitTestHandle, hoverCursor } from "./selection/hitTest";
export { createSelectionState, reduceSelection } from "./selection/selectionStateMachine";
export type { SelectionOutcome } from "./selection/SelectionEditor";
export { SelectionEditor } from "./selection/SelectionEditor";

import type { FrameProvider } from "@depthmark/tracking";

import type { DepthGrid } from "../depth/depthStats";

/**
 * Paired RGB/depth sequence supplied by the host. Depth is aligned 1:1 with
 * the image pixels; frames without a depth map resolve to null.
 */
export interface FrameSource extends FrameProvider {
  getDepth(index: number): Promise<DepthGrid | null>;
}

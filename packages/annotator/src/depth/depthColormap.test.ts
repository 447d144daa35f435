import { describe, expect, it } from "vitest";

import { cropDepthGrid, jetColor, renderDepthColormap } from "./depthColormap";

describe("depthColormap", () => {
  it("spans the jet palette", () => {
    expect(jetColor(0)).toEqual([0, 0, 128]);
    expect(jetColor(0.5)).toEqual([128, 255, 128]);
    expect(jetColor(1)).toEqual([128, 0, 0]);
  });

  it("colours near readings warm, far readings cold and invalid cells black", () => {
    const grid = { width: 4, height: 1, data: [1, 20, 0, 25] };

    const image = renderDepthColormap(grid, { minDepth: 1, maxDepth: 20 });

    expect(Array.from(image.data)).toEqual([
      128, 0, 0, 255,
      0, 0, 128, 255,
      0, 0, 0, 255,
      0, 0, 0, 255
    ]);
  });

  it("rejects an empty band", () => {
    expect(() => renderDepthColormap({ width: 1, height: 1, data: [1] }, { minDepth: 2, maxDepth: 2 })).toThrow(
      RangeError
    );
  });

  it("crops to the cells a fractional window touches", () => {
    const grid = { width: 3, height: 2, data: [1, 2, 3, 4, 5, 6] };

    const cropped = cropDepthGrid(grid, { x: 0.5, y: 1, w: 1.2, h: 1 });

    expect(cropped.width).toBe(2);
    expect(cropped.height).toBe(1);
    expect(Array.from(cropped.data)).toEqual([4, 5]);
  });
});

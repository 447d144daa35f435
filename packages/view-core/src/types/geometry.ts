export type Point = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

/** Axis-aligned rectangle; `w`/`h` extend right and down from `x`/`y`. */
export type Rect = {
  x: number;
  y: number;
  w: number;
  h: number;
};

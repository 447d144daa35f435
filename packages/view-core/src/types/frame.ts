/**
 * Decoded RGBA frame as handed over by the host application.
 * Same layout as a canvas `ImageData`: 4 bytes per pixel, row-major.
 */
export type ImageFrame = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

export function isValidFrame(frame: ImageFrame): boolean {
  return (
    Number.isInteger(frame.width) &&
    Number.isInteger(frame.height) &&
    frame.width > 0 &&
    frame.height > 0 &&
    frame.data.length >= frame.width * frame.height * 4
  );
}

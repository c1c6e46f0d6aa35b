import type { Affine, PixelWindow } from "../types/index.js";

/** Coordinates of the top-left corner of the given pixel */
export function apply(
  transform: Affine,
  column: number,
  row: number,
): [x: number, y: number] {
  const [a, b, c, d, e, f] = transform;
  return [a * column + b * row + c, d * column + e * row + f];
}

/**
 * Transform of a window, same scale and rotation as its parent but with the
 * origin moved to the window's top-left corner
 */
export function windowTransform(
  transform: Affine,
  window: Pick<PixelWindow, "column" | "row">,
): Affine {
  const [a, b, , d, e] = transform;
  const [x, y] = apply(transform, window.column, window.row);
  return [a, b, x, d, e, y];
}

/** Axis-aligned, as north-up imagery is */
export function isRectilinear(transform: Affine): boolean {
  const [a, b, , d, e] = transform;
  return b === 0 && d === 0 && a !== 0 && e !== 0;
}

import type { ScaleFunction } from '../utils/scales';

/**
 * Resolves a pixel x position to the nearest data column.
 *
 * Coordinate system contract:
 * - `pixelX` MUST be in the same units as the x scale's **range** (plot-local pixels).
 * - `invert` is the x scale's inverse, mapping range units back to column indices.
 *
 * Behavior:
 * - Rounds the inverted value to the nearest integer column.
 * - Clamps to `[0, pointCount - 1]`, so positions left or right of the plot
 *   select the first or last column.
 * - Returns null when there are no columns or the inverted value is not finite.
 */
export function findColumnAtX(pixelX: number, invert: ScaleFunction, pointCount: number): number | null {
  if (!Number.isFinite(pointCount) || pointCount < 1) return null;

  const inverted = invert(pixelX);
  if (!Number.isFinite(inverted)) return null;

  const column = Math.round(inverted);
  if (column <= 0) return 0;
  if (column > pointCount - 1) return Math.floor(pointCount) - 1;
  return column;
}

/**
 * modules/common/src/core/geometry.ts
 *
 * @file Shared screen geometry types and rectangle helpers used by dialog placement.
 */

/**
 * A point in screen coordinates (integer pixel units, origin top-left).
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Width and height of a dialog or display.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Axis-aligned rectangle describing a dialog's position and size.
 */
export interface Rect extends Point, Size {}

/**
 * Check whether two rectangles overlap. Rectangles that only share an edge do not overlap.
 *
 * @param a - First rectangle.
 * @param b - Second rectangle.
 * @returns `true` if the interiors intersect.
 */
export function rectanglesOverlap(a: Rect, b: Rect): boolean {
  return !(
    a.x + a.width <= b.x ||
    b.x + b.width <= a.x ||
    a.y + a.height <= b.y ||
    b.y + b.height <= a.y
  );
}

/**
 * Check whether a rectangle overlaps at least one of the given rectangles.
 *
 * @param rects - Occupied rectangles.
 * @param candidate - Rectangle to test.
 * @returns `true` on the first overlap found.
 */
export function overlapsAny(rects: readonly Rect[], candidate: Rect): boolean {
  return rects.some(rect => rectanglesOverlap(rect, candidate));
}

/**
 * Squared Euclidean distance between two points.
 */
export function squaredDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/**
 * Take a plain rectangle snapshot from anything carrying position and size, e.g. a live dialog handle.
 */
export function rectOf(source: Readonly<Rect>): Rect {
  return {x: source.x, y: source.y, width: source.width, height: source.height};
}

/**
 * Check that a size has positive integer dimensions.
 */
export function isValidSize(size: Size): boolean {
  return Number.isInteger(size.width) && Number.isInteger(size.height) && size.width > 0 && size.height > 0;
}

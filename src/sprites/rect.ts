import type { Point, Rect, Size } from '../backend/types';

/**
 * Right edge, one past the last covered column
 */
export function rectRight(rect: Rect): number {
  return rect.x + rect.width;
}

/**
 * Bottom edge, one past the last covered row
 */
export function rectBottom(rect: Rect): number {
  return rect.y + rect.height;
}

/**
 * Inclusive point-in-rectangle test: points on any edge,
 * including the right and bottom edges, count as inside.
 */
export function containsPoint(rect: Rect, point: Point): boolean {
  return rect.x <= point.x && point.x <= rectRight(rect)
    && rect.y <= point.y && point.y <= rectBottom(rect);
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

export function sizesEqual(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}

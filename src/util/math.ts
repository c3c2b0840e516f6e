import type { Rect } from "../types";

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function squareAround(centerX: number, centerY: number, side: number): Rect {
  const half = side / 2;
  return {
    left: centerX - half,
    top: centerY - half,
    right: centerX + half,
    bottom: centerY + half
  };
}

/**
 * Rectangles are half-open on both axes, so edges that only touch never overlap.
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.left < b.right && b.left < a.right && a.top < b.bottom && b.top < a.bottom;
}

// Applies affine maps to points and to displacement vectors.

import type { AffineTransform } from "./types.js";

export interface Vec2 {
  x: number;
  y: number;
}

/** Full map, translation included. */
export function applyAffine(affine: AffineTransform, x: number, y: number): Vec2 {
  return {
    x: affine.a * x + affine.b * y + affine.tx,
    y: affine.c * x + affine.d * y + affine.ty,
  };
}

/**
 * Rotate/scale a displacement with the map's linear part. A displacement is
 * never shifted by (tx, ty). With no affine the offset is returned unchanged.
 */
export function transformOffset(dx: number, dy: number, affine: AffineTransform | null): Vec2 {
  if (affine === null) return { x: dx, y: dy };
  return {
    x: affine.a * dx + affine.b * dy,
    y: affine.c * dx + affine.d * dy,
  };
}

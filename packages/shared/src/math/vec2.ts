/**
 * Float interpolation helpers for presentation-side code (render views,
 * remote entity sampling). The simulation itself works in fixed-point; see
 * fixed.ts.
 */

/** Interpolate one coordinate on a ring, taking the short way around */
export function lerpWrapped(a: number, b: number, t: number, size: number): number {
  let d = b - a
  if (d > size / 2) d -= size
  else if (d < -size / 2) d += size
  let v = a + d * t
  if (v < 0) v += size
  else if (v >= size) v -= size
  return v
}

/**
 * Interpolate between two angles in radians along the shorter arc.
 */
export function lerpAngle(a: number, b: number, t: number): number {
  let d = b - a
  while (d > Math.PI) d -= Math.PI * 2
  while (d < -Math.PI) d += Math.PI * 2
  return a + d * t
}

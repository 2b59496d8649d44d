/**
 * Fixed-Point Math
 *
 * Simulation state is stored as integers so that every client and the server
 * compute bit-identical results. Positions and velocities use a 16.16 format
 * in world pixels; angles use 1024 units per full turn.
 *
 * Products stay exact while |a * b| < 2^53, which holds for every quantity
 * in a 1920x1080 world.
 */

import SIN_TABLE from './sinTable.json'

export const FP_SHIFT = 16
export const FP_ONE = 1 << FP_SHIFT

/** Angle units per full turn */
export const ANGLE_UNITS = 1024
export const ANGLE_MASK = ANGLE_UNITS - 1
/** Angle units per quarter turn (one quadrant of SIN_TABLE) */
export const QUARTER_TURN = ANGLE_UNITS / 4

/** Fixed-point numbers are plain integers */
export type Fixed = number

/** Integer angle in [0, ANGLE_UNITS) */
export type Angle = number

/** Convert float to fixed-point */
export function toFixed(f: number): Fixed {
  return Math.round(f * FP_ONE) + 0
}

/** Convert fixed-point to float (presentation only) */
export function toFloat(fp: Fixed): number {
  return fp / FP_ONE
}

/** Fixed-point multiplication, rounding toward negative infinity */
export function fpMul(a: Fixed, b: Fixed): Fixed {
  const r = Math.floor((a * b) / FP_ONE)
  return r === 0 ? 0 : r
}

/** Integer division truncating toward zero. Never returns -0. */
export function idiv(a: number, b: number): number {
  const q = Math.trunc(a / b)
  return q === 0 ? 0 : q
}

/** Exact integer square root: largest r with r*r <= n */
export function isqrt(n: number): number {
  if (n <= 0) return 0
  let r = Math.floor(Math.sqrt(n))
  while (r * r > n) r--
  while ((r + 1) * (r + 1) <= n) r++
  return r
}

/** Wrap any integer angle into [0, ANGLE_UNITS) */
export function wrapAngle(a: Angle): Angle {
  return a & ANGLE_MASK
}

/** Table-driven sine, returned in fixed-point */
export function fpSin(a: Angle): Fixed {
  const angle = a & ANGLE_MASK
  const quadrant = angle >> 8
  const idx = angle & (QUARTER_TURN - 1)
  switch (quadrant) {
    case 0:
      return SIN_TABLE[idx]
    case 1:
      return SIN_TABLE[QUARTER_TURN - idx]
    case 2:
      return 0 - SIN_TABLE[idx]
    default:
      return 0 - SIN_TABLE[QUARTER_TURN - idx]
  }
}

/** Table-driven cosine, returned in fixed-point */
export function fpCos(a: Angle): Fixed {
  return fpSin(a + QUARTER_TURN)
}

/** Angle units to radians (presentation only) */
export function angleToRadians(a: Angle): number {
  return ((a & ANGLE_MASK) / ANGLE_UNITS) * Math.PI * 2
}

/**
 * Shortest signed difference a - b on a ring of the given size.
 * Result lies in [-size/2, size/2).
 */
export function wrapDelta(d: number, size: number): number {
  const half = size / 2
  let r = d % size
  if (r >= half) r -= size
  else if (r < -half) r += size
  return r === 0 ? 0 : r
}

/** Bring a coordinate into [0, size) */
export function wrapCoord(v: number, size: number): number {
  const r = ((v % size) + size) % size
  return r === 0 ? 0 : r
}

/**
 * Visual offset that hides reconciliation corrections.
 *
 * When replay moves the local ship, the offset starts at (old - new) so the
 * ship is drawn where it was and then slides to where it is. The simulation
 * never sees the offset.
 */

/** Below this (world pixels) the offset is dropped */
const SETTLE_EPSILON = 0.1
/** Frame times above this are clamped so a stalled tab doesn't jump */
const MAX_FRAME_SECONDS = 0.1

export class CorrectionSmoother {
  private offsetX = 0
  private offsetY = 0

  constructor(
    /** Exponential decay rate per second */
    private readonly decay: number,
    /** Offsets longer than this snap to zero */
    private readonly snapThreshold: number
  ) {}

  get x(): number {
    return this.offsetX
  }

  get y(): number {
    return this.offsetY
  }

  get active(): boolean {
    return this.offsetX !== 0 || this.offsetY !== 0
  }

  /**
   * Add a correction.
   *
   * @returns false if the combined offset was too large and snapped instead
   */
  add(dx: number, dy: number): boolean {
    const x = this.offsetX + dx
    const y = this.offsetY + dy
    if (Math.hypot(x, y) > this.snapThreshold) {
      this.reset()
      return false
    }
    this.offsetX = x
    this.offsetY = y
    return true
  }

  /** Decay toward zero over one render frame */
  update(frameSeconds: number): void {
    if (!this.active) return
    const dt = Math.min(Math.max(frameSeconds, 0), MAX_FRAME_SECONDS)
    const factor = Math.exp(-this.decay * dt)
    this.offsetX *= factor
    this.offsetY *= factor
    if (Math.abs(this.offsetX) < SETTLE_EPSILON) this.offsetX = 0
    if (Math.abs(this.offsetY) < SETTLE_EPSILON) this.offsetY = 0
  }

  reset(): void {
    this.offsetX = 0
    this.offsetY = 0
  }
}

import { TICK_MS } from '@rubble/shared'

const LEAD_BLEND = 0.15

/** Predicted ticks to run this fixed update, or 'snap' to jump to the target */
export type LeadSteps = 0 | 1 | 2 | 'snap'

/**
 * How far ahead of the server the prediction head runs.
 *
 * An input for tick T must reach the server before it advances T, so the
 * client predicts about half a round trip plus a small margin ahead of its
 * estimate of the server tick. The lead follows RTT changes gradually and
 * snaps on large jumps; the head is steered back by running one extra or one
 * fewer predicted tick per update.
 */
export class TickLead {
  private leadTicks: number
  private initialized = false

  constructor(
    private readonly margin: number,
    private readonly snapThresholdTicks: number
  ) {
    this.leadTicks = margin
  }

  /** Current lead in ticks (fractional) */
  get lead(): number {
    return this.leadTicks
  }

  observeRtt(rttMs: number): void {
    if (!Number.isFinite(rttMs) || rttMs < 0) return

    const desired = Math.ceil(rttMs / 2 / TICK_MS) + this.margin
    if (!this.initialized) {
      this.leadTicks = desired
      this.initialized = true
      return
    }

    const delta = desired - this.leadTicks
    if (Math.abs(delta) > this.snapThresholdTicks) {
      this.leadTicks = desired
      return
    }
    this.leadTicks += delta * LEAD_BLEND
  }

  /** Tick the head should be at for an estimated server tick */
  targetTick(serverTick: number): number {
    return Math.round(serverTick + this.leadTicks)
  }

  /**
   * Steps for one fixed update. A drift of one tick either way is tolerated;
   * more than the snap threshold means prediction restarts at the target.
   */
  stepsFor(headTick: number, serverTick: number): LeadSteps {
    const drift = this.targetTick(serverTick) - headTick
    if (Math.abs(drift) > this.snapThresholdTicks) return 'snap'
    if (drift >= 2) return 2
    if (drift <= -2) return 0
    return 1
  }

  reset(): void {
    this.leadTicks = this.margin
    this.initialized = false
  }
}

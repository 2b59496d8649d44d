/**
 * Snapshot interpolation buffer.
 *
 * Stores recent applied server snapshots with their server time (tick times
 * TICK_MS) and receive time, and provides interpolation state for drawing
 * remote entities a little in the past.
 */

import { TICK_MS, type WorldSnapshot } from '@rubble/shared'

export interface TimestampedSnapshot {
  snapshot: WorldSnapshot
  receiveTime: number // local clock, fallback
  serverTime: number // snapshot.tick * TICK_MS, used when clock sync converged
}

export interface InterpolationState {
  from: WorldSnapshot
  to: WorldSnapshot
  alpha: number
}

/** Maximum number of snapshots to retain */
const MAX_BUFFER_SIZE = 8
/** Default delay in snapshot intervals */
const DEFAULT_DELAY_INTERVALS = 1.5
/** Upper bound to keep remote presentation responsive */
const MAX_INTERPOLATION_DELAY = 250
/** Convert observed interval jitter into delay headroom */
const DELAY_JITTER_MULTIPLIER = 2
/** EWMA smoothing for interval jitter estimation */
const JITTER_SMOOTHING = 0.1
/** Decrease delay slowly to avoid oscillation */
const DELAY_DECAY = 0.1

export class SnapshotBuffer {
  private buffer: TimestampedSnapshot[] = []
  private readonly baseInterpolationDelay: number
  private dynamicInterpolationDelay: number
  private lastReceiveTime: number | null = null
  private intervalJitter = 0

  /**
   * @param snapshotIntervalMs - Expected spacing of snapshots
   * @param now - Local clock
   */
  constructor(
    private readonly snapshotIntervalMs: number,
    private readonly now: () => number = () => performance.now()
  ) {
    this.baseInterpolationDelay = snapshotIntervalMs * DEFAULT_DELAY_INTERVALS
    this.dynamicInterpolationDelay = this.baseInterpolationDelay
  }

  push(snapshot: WorldSnapshot): void {
    const latest = this.buffer.at(-1)
    if (latest && snapshot.tick <= latest.snapshot.tick) return

    const receiveTime = this.now()
    this.buffer.push({ snapshot, receiveTime, serverTime: snapshot.tick * TICK_MS })
    this.updateAdaptiveDelay(receiveTime)

    // Evict old snapshots
    if (this.buffer.length > MAX_BUFFER_SIZE) {
      this.buffer.shift()
    }
  }

  private updateAdaptiveDelay(receiveTime: number): void {
    if (this.lastReceiveTime === null) {
      this.lastReceiveTime = receiveTime
      return
    }

    const interval = receiveTime - this.lastReceiveTime
    this.lastReceiveTime = receiveTime

    // Guard against clock jumps and long stalls
    if (!Number.isFinite(interval) || interval <= 0 || interval > 1000) return

    // Estimate irregularity in arrival spacing
    const deviation = Math.abs(interval - this.snapshotIntervalMs)
    this.intervalJitter += (deviation - this.intervalJitter) * JITTER_SMOOTHING

    const target = Math.max(
      this.baseInterpolationDelay,
      Math.min(MAX_INTERPOLATION_DELAY, this.baseInterpolationDelay + this.intervalJitter * DELAY_JITTER_MULTIPLIER)
    )

    // Increase quickly for resilience; decrease slowly for stability.
    if (target > this.dynamicInterpolationDelay) {
      this.dynamicInterpolationDelay = target
    } else {
      this.dynamicInterpolationDelay += (target - this.dynamicInterpolationDelay) * DELAY_DECAY
    }
  }

  /** The most recently pushed snapshot, or null if buffer is empty */
  get latest(): WorldSnapshot | null {
    return this.buffer.at(-1)?.snapshot ?? null
  }

  get interpolationDelay(): number {
    return this.dynamicInterpolationDelay
  }

  get size(): number {
    return this.buffer.length
  }

  /**
   * Compute interpolation state for the current render frame.
   *
   * Finds two snapshots bracketing `now - interpolationDelay` and returns
   * the pair with a clamped alpha in [0, 1].
   *
   * When `serverTimeNow` is provided (estimated server tick times TICK_MS,
   * from ClockSync), brackets on server time. Otherwise falls back to local
   * receive times.
   */
  getInterpolationState(serverTimeNow?: number): InterpolationState | null {
    if (this.buffer.length < 2) return null

    const useServerTime = serverTimeNow !== undefined
    const timeOf = (entry: TimestampedSnapshot) => (useServerTime ? entry.serverTime : entry.receiveTime)
    const renderTime = (serverTimeNow ?? this.now()) - this.dynamicInterpolationDelay

    // Find the bracketing pair: last entry where timestamp <= renderTime
    let fromIdx = -1
    for (let i = this.buffer.length - 1; i >= 0; i--) {
      if (timeOf(this.buffer[i]) <= renderTime) {
        fromIdx = i
        break
      }
    }

    // No snapshot old enough: we're too far ahead, use oldest two
    if (fromIdx === -1) {
      return { from: this.buffer[0].snapshot, to: this.buffer[1].snapshot, alpha: 0 }
    }

    // No snapshot after from: use last two
    if (fromIdx >= this.buffer.length - 1) {
      const last = this.buffer.length - 1
      return { from: this.buffer[last - 1].snapshot, to: this.buffer[last].snapshot, alpha: 1 }
    }

    const from = this.buffer[fromIdx]
    const to = this.buffer[fromIdx + 1]
    const span = timeOf(to) - timeOf(from)
    const alpha = span > 0 ? Math.max(0, Math.min(1, (renderTime - timeOf(from)) / span)) : 1

    return { from: from.snapshot, to: to.snapshot, alpha }
  }

  clear(): void {
    this.buffer.length = 0
    this.dynamicInterpolationDelay = this.baseInterpolationDelay
    this.lastReceiveTime = null
    this.intervalJitter = 0
  }
}

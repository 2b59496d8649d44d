import type { Fixed, InputState } from '@rubble/shared'

/** The local ship as predicted after a tick */
export interface PredictedShip {
  x: Fixed
  y: Fixed
  vx: Fixed
  vy: Fixed
  heading: number
}

export interface PredictionEntry {
  tick: number
  input: InputState
  /** null when the local ship did not exist after the tick */
  ship: PredictedShip | null
}

/**
 * Predicted ticks awaiting confirmation, ordered by tick.
 *
 * Entries are confirmed (removed) once an authoritative snapshot at or past
 * their tick arrives; whatever is left is replayed on top of it.
 */
export class PredictionBuffer {
  private buffer: PredictionEntry[] = []
  private dropped = false

  constructor(private readonly maxSize = 128) {}

  /** Append the next tick. Evicts the oldest on overflow. */
  push(entry: PredictionEntry): void {
    const last = this.buffer.at(-1)
    if (last && entry.tick !== last.tick + 1) {
      throw new Error(`Prediction buffer expects tick ${last.tick + 1}, got ${entry.tick}`)
    }
    if (this.buffer.length >= this.maxSize) {
      this.buffer.shift()
      this.dropped = true
    }
    this.buffer.push(entry)
  }

  /** Remove all entries with tick <= confirmedTick (binary search, the buffer is sorted) */
  discardThrough(confirmedTick: number): void {
    const len = this.buffer.length
    const first = this.buffer[0]
    if (len === 0 || first === undefined || first.tick > confirmedTick) return

    let lo = 0
    let hi = len - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1
      if (this.buffer[mid].tick <= confirmedTick) {
        lo = mid
      } else {
        hi = mid - 1
      }
    }
    this.buffer.splice(0, lo + 1)
  }

  /**
   * Whether every tick in [from, to] is present. An empty range is always
   * covered.
   */
  covers(from: number, to: number): boolean {
    if (to < from) return true
    const first = this.buffer[0]
    const last = this.buffer.at(-1)
    if (!first || !last) return false
    return first.tick <= from && last.tick >= to
  }

  /** Remaining entries in tick order */
  getEntries(): readonly PredictionEntry[] {
    return this.buffer
  }

  /** Whether entries were evicted since the last clear */
  get overflowed(): boolean {
    return this.dropped
  }

  get length(): number {
    return this.buffer.length
  }

  clear(): void {
    this.buffer.length = 0
    this.dropped = false
  }
}

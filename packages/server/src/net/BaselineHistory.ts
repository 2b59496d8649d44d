import type { WorldSnapshot } from '@rubble/shared'

/**
 * Ring-buffer history of the snapshots sent to one client, keyed by tick.
 * A delta can only be built against a tick still in the history; once the
 * client's acked tick ages out, it has to be resynchronized with a full
 * snapshot.
 */
export class BaselineHistory {
  private readonly frames: WorldSnapshot[] = []
  private readonly maxFrames: number

  constructor(maxFrames = 32) {
    this.maxFrames = Math.max(1, Math.trunc(maxFrames))
  }

  get size(): number {
    return this.frames.length
  }

  /** Ticks must be recorded in increasing order */
  record(snapshot: WorldSnapshot): void {
    const newest = this.getNewestTick()
    if (newest !== null && snapshot.tick <= newest) {
      throw new RangeError(`Baseline tick ${snapshot.tick} is not after ${newest}`)
    }
    this.frames.push(snapshot)
    if (this.frames.length > this.maxFrames) {
      this.frames.shift()
    }
  }

  clear(): void {
    this.frames.length = 0
  }

  hasTick(tick: number): boolean {
    return this.get(tick) !== null
  }

  get(tick: number): WorldSnapshot | null {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i]
      if (frame.tick === tick) return frame
      if (frame.tick < tick) break
    }
    return null
  }

  getNewest(): WorldSnapshot | null {
    return this.frames.length > 0 ? this.frames[this.frames.length - 1] : null
  }

  getOldestTick(): number | null {
    return this.frames.length > 0 ? this.frames[0].tick : null
  }

  getNewestTick(): number | null {
    return this.frames.length > 0 ? this.frames[this.frames.length - 1].tick : null
  }

  /** Drop every frame older than `tick`; acked baselines make them useless */
  pruneBefore(tick: number): void {
    let drop = 0
    while (drop < this.frames.length && this.frames[drop].tick < tick) drop++
    if (drop > 0) this.frames.splice(0, drop)
  }
}

/**
 * GameLoop - Fixed timestep game loop
 *
 * Implements the accumulator pattern for fixed timestep simulation
 * with interpolation for smooth rendering at any frame rate.
 *
 * Reference: https://gafferongames.com/post/fix_your_timestep/
 */

import { TICK_MS } from '@rubble/shared'

export type UpdateCallback = () => void
/** alpha: progress toward the next tick, frameSeconds: wall time since the last frame */
export type RenderCallback = (alpha: number, frameSeconds: number) => void

/** Schedules the next frame; requestAnimationFrame in a browser */
export interface FrameScheduler {
  request(callback: (now: number) => void): number
  cancel(handle: number): void
}

/** Maximum fixed updates per frame to prevent render starvation */
const MAX_CATCHUP_STEPS = 4

/** Frame spacing when there is no requestAnimationFrame */
const FALLBACK_FRAME_MS = 16

function defaultScheduler(): FrameScheduler {
  if (typeof requestAnimationFrame === 'function') {
    return {
      request: (callback) => requestAnimationFrame(callback),
      cancel: (handle) => cancelAnimationFrame(handle),
    }
  }
  const timers = new Map<number, ReturnType<typeof setTimeout>>()
  let nextHandle = 1
  return {
    request: (callback) => {
      const handle = nextHandle++
      timers.set(
        handle,
        setTimeout(() => {
          timers.delete(handle)
          callback(performance.now())
        }, FALLBACK_FRAME_MS)
      )
      return handle
    },
    cancel: (handle) => {
      clearTimeout(timers.get(handle))
      timers.delete(handle)
    },
  }
}

/**
 * Fixed timestep game loop with interpolation
 */
export class GameLoop {
  private accumulator = 0
  private lastTime = 0
  private running = false
  private frameHandle: number | null = null

  private _tick = 0
  private _frameCount = 0
  private _fps = 0

  private fpsAccumulator = 0
  private fpsFrames = 0

  constructor(
    private readonly onUpdate: UpdateCallback,
    private readonly onRender: RenderCallback,
    private readonly scheduler: FrameScheduler = defaultScheduler(),
    private readonly now: () => number = () => performance.now()
  ) {}

  /** Fixed updates run so far */
  get tick(): number {
    return this._tick
  }

  /** Frames rendered */
  get frameCount(): number {
    return this._frameCount
  }

  /** Current FPS (updated every second) */
  get fps(): number {
    return this._fps
  }

  start(): void {
    if (this.running) return

    this.running = true
    this.lastTime = this.now()
    this.accumulator = 0

    this.frame(this.lastTime)
  }

  stop(): void {
    this.running = false
    if (this.frameHandle !== null) {
      this.scheduler.cancel(this.frameHandle)
      this.frameHandle = null
    }
  }

  /**
   * One loop iteration: run due fixed updates, render, schedule the next
   * frame. Does nothing once stopped.
   */
  frame = (currentTime: number): void => {
    if (!this.running) return

    const deltaTime = Math.max(0, currentTime - this.lastTime)
    this.lastTime = currentTime

    // If a frame took > 250ms we're probably in a background tab
    const cappedDelta = Math.min(deltaTime, 250)

    this.accumulator += cappedDelta

    let catchupSteps = 0
    while (this.accumulator >= TICK_MS && catchupSteps < MAX_CATCHUP_STEPS) {
      this.onUpdate()
      this.accumulator -= TICK_MS
      this._tick++
      catchupSteps++
    }

    // If we hit the cap, drop the excess backlog to avoid long update bursts
    if (catchupSteps >= MAX_CATCHUP_STEPS && this.accumulator >= TICK_MS) {
      this.accumulator %= TICK_MS
    }

    this.onRender(this.accumulator / TICK_MS, cappedDelta / 1000)
    this._frameCount++

    this.fpsAccumulator += deltaTime
    this.fpsFrames++
    if (this.fpsAccumulator >= 1000) {
      this._fps = Math.round((this.fpsFrames * 1000) / this.fpsAccumulator)
      this.fpsAccumulator = 0
      this.fpsFrames = 0
    }

    // An update or render callback may have stopped the loop
    if (this.running) {
      this.frameHandle = this.scheduler.request(this.frame)
    }
  }

  isRunning(): boolean {
    return this.running
  }
}

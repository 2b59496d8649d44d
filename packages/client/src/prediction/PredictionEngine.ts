/**
 * PredictionEngine - client-side speculation and rollback
 *
 * Keeps a predicted world (the head) running ahead of the last confirmed
 * server tick. Every predicted tick is recorded with the local input and the
 * local ship's resulting state. When an authoritative snapshot for tick T
 * arrives, the head is rebuilt from it and the recorded inputs T+1..head
 * are replayed; a replay that moves the local ship shows up as a
 * CorrectionSmoother offset rather than a visible jump.
 *
 * Everything runs in server tick space: head.tick is the tick the local
 * input will drive on the server.
 */

import {
  NO_ENTITY,
  advance,
  createDefaultSystems,
  hashWorld,
  restoreWorld,
  toFixed,
  toFloat,
  wrapDelta,
  type EntityId,
  type Fixed,
  type GameEvent,
  type GameWorld,
  type InputState,
  type SimConfig,
  type SystemRegistry,
  type WorldSnapshot,
} from '@rubble/shared'
import { CorrectionSmoother } from './CorrectionSmoother'
import { PredictionBuffer, type PredictedShip } from './PredictionBuffer'

export interface PredictionOptions {
  /** Ship driven by local input; NO_ENTITY to only watch */
  shipId: EntityId
  simConfig: SimConfig
  bufferSize: number
  /** World pixels */
  correctionEpsilon: number
  correctionDecay: number
  snapThreshold: number
  verifyDeterminism: boolean
  debug: boolean
  /** Pipeline to predict with; the default pipeline when omitted */
  systems?: SystemRegistry
}

export type ResyncReason =
  /** Predicted ticks were evicted before they were confirmed */
  | 'overflow'
  /** The head is behind the confirmed tick */
  | 'behind'
  /** Recorded ticks do not reach from the confirmed tick to the head */
  | 'gap'

export type ReconcileResult =
  | { kind: 'ignored' }
  | { kind: 'resync'; reason: ResyncReason }
  | { kind: 'replayed'; ticks: number; mispredicted: number }

/** A predicted step produced a different world when run twice */
export class DeterminismError extends Error {
  constructor(
    readonly tick: number,
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Non-deterministic step at tick ${tick}: hash ${expected} vs ${actual}`)
    this.name = 'DeterminismError'
  }
}

function shipState(world: GameWorld, shipId: EntityId): PredictedShip | null {
  const ship = world.ships.get(shipId)
  if (!ship) return null
  return { x: ship.x, y: ship.y, vx: ship.vx, vy: ship.vy, heading: ship.heading }
}

export class PredictionEngine {
  readonly buffer: PredictionBuffer
  readonly smoother: CorrectionSmoother
  private readonly systems: SystemRegistry
  private readonly epsilon: Fixed
  private readonly width: Fixed
  private readonly height: Fixed
  private head: GameWorld | null = null
  private previous: GameWorld | null = null
  private confirmedTick = 0

  constructor(private readonly options: PredictionOptions) {
    this.systems = options.systems ?? createDefaultSystems()
    this.buffer = new PredictionBuffer(options.bufferSize)
    this.smoother = new CorrectionSmoother(options.correctionDecay, options.snapThreshold)
    this.epsilon = toFixed(options.correctionEpsilon)
    this.width = toFixed(options.simConfig.worldWidth)
    this.height = toFixed(options.simConfig.worldHeight)
  }

  get shipId(): EntityId {
    return this.options.shipId
  }

  /** Whether a confirmed state has been adopted yet */
  get ready(): boolean {
    return this.head !== null
  }

  /** Tick of the predicted head, 0 before the first resync */
  get headTick(): number {
    return this.head?.tick ?? 0
  }

  get lastConfirmedTick(): number {
    return this.confirmedTick
  }

  getHead(): GameWorld | null {
    return this.head
  }

  /** The head one predicted tick ago, for render interpolation */
  getPrevious(): GameWorld | null {
    return this.previous
  }

  /**
   * Throw away the prediction and continue from an authoritative state.
   */
  resync(snapshot: WorldSnapshot): void {
    this.head = restoreWorld(snapshot, this.options.simConfig)
    this.previous = this.head
    this.buffer.clear()
    this.confirmedTick = snapshot.tick
    this.smoother.reset()
  }

  /**
   * Predict one tick with the local input.
   *
   * @returns The tick's events (speculative)
   * @throws DeterminismError in debug mode when verification fails
   */
  step(input: InputState): readonly GameEvent[] {
    const head = this.head
    if (!head) throw new Error('PredictionEngine.step before the first resync')

    const inputs = this.inputsFor(input)
    const next = advance(head, inputs, this.systems)
    if (this.options.verifyDeterminism) {
      this.verify(head, inputs, next)
    }

    this.previous = head
    this.head = next
    this.buffer.push({ tick: next.tick, input, ship: shipState(next, this.options.shipId) })
    return next.events
  }

  /**
   * Rebuild the head from an authoritative snapshot and replay the
   * unconfirmed inputs on top of it.
   *
   * A 'resync' result means the prediction could not be carried forward;
   * the head now is the snapshot and the caller should ask the server for a
   * full snapshot.
   */
  reconcile(snapshot: WorldSnapshot): ReconcileResult {
    const head = this.head
    const tick = snapshot.tick
    if (!head || tick <= this.confirmedTick) return { kind: 'ignored' }

    this.confirmedTick = tick
    this.buffer.discardThrough(tick)

    if (head.tick < tick) return this.resyncFrom(snapshot, 'behind')
    if (!this.buffer.covers(tick + 1, head.tick)) {
      return this.resyncFrom(snapshot, this.buffer.overflowed ? 'overflow' : 'gap')
    }

    const before = shipState(head, this.options.shipId)
    let world = restoreWorld(snapshot, this.options.simConfig)
    let previous = world
    let mispredicted = 0
    for (const entry of this.buffer.getEntries()) {
      previous = world
      world = advance(world, this.inputsFor(entry.input), this.systems)
      const replayed = shipState(world, this.options.shipId)
      if (this.diverged(entry.ship, replayed)) mispredicted++
      entry.ship = replayed
    }
    this.previous = previous
    this.head = world

    const after = shipState(world, this.options.shipId)
    if (before && after) {
      this.applyCorrection(before, after)
    } else if (!after) {
      this.smoother.reset()
    }

    return { kind: 'replayed', ticks: this.buffer.length, mispredicted }
  }

  private resyncFrom(snapshot: WorldSnapshot, reason: ResyncReason): ReconcileResult {
    console.warn(`[Prediction] Resync at tick ${snapshot.tick} (${reason}, head was ${this.headTick})`)
    this.resync(snapshot)
    return { kind: 'resync', reason }
  }

  private inputsFor(input: InputState): Map<EntityId, InputState> {
    const inputs = new Map<EntityId, InputState>()
    if (this.options.shipId !== NO_ENTITY) inputs.set(this.options.shipId, input)
    return inputs
  }

  private verify(head: GameWorld, inputs: Map<EntityId, InputState>, next: GameWorld): void {
    const expected = hashWorld(next)
    const actual = hashWorld(advance(head, inputs, this.systems))
    if (expected === actual) return

    const error = new DeterminismError(next.tick, expected, actual)
    if (this.options.debug) throw error
    console.error(`[Prediction] ${error.message}`)
  }

  /** Position or velocity differ by more than the correction epsilon */
  private diverged(recorded: PredictedShip | null, replayed: PredictedShip | null): boolean {
    if (!recorded || !replayed) return recorded !== replayed
    return (
      Math.abs(wrapDelta(recorded.x - replayed.x, this.width)) > this.epsilon ||
      Math.abs(wrapDelta(recorded.y - replayed.y, this.height)) > this.epsilon ||
      Math.abs(recorded.vx - replayed.vx) > this.epsilon ||
      Math.abs(recorded.vy - replayed.vy) > this.epsilon
    )
  }

  private applyCorrection(before: PredictedShip, after: PredictedShip): void {
    const dx = toFloat(wrapDelta(before.x - after.x, this.width))
    const dy = toFloat(wrapDelta(before.y - after.y, this.height))
    if (Math.hypot(dx, dy) <= this.options.correctionEpsilon) return
    if (!this.smoother.add(dx, dy)) {
      console.warn(`[Prediction] Correction of ${Math.hypot(dx, dy).toFixed(1)}px snapped`)
    }
  }
}

import {
  ACK_REQUEST_FULL,
  NO_ENTITY,
  normalizeInput,
  unpackInputs,
  type AckMessage,
  type EntityId,
  type InputMessage,
  type InputState,
  type WorldSnapshot,
} from '@rubble/shared'
import { BaselineHistory } from './BaselineHistory'

/**
 * Per-client replication state.
 *
 * - connecting: joined, no running match
 * - synchronizing: every snapshot sent is full
 * - connected: deltas against the last acked baseline
 * - disconnected: terminal
 */
export type SessionState = 'connecting' | 'synchronizing' | 'connected' | 'disconnected'

export interface SessionOptions {
  maxInputQueue: number
  maxProtocolViolations: number
  baselineHistory: number
  inputRateLimitPerSecond: number
  inputRateBurst: number
}

export type InputReceipt = 'accepted' | 'duplicate' | 'rate-limited' | 'stale' | 'ignored'

export class ClientSession {
  readonly id: string
  state: SessionState = 'connecting'
  /** Ship this client drives, NO_ENTITY while it has none */
  shipId: EntityId = NO_ENTITY

  /** Newest snapshot tick the client acknowledged */
  lastAckedTick = 0
  /** First full snapshot sent since synchronizing began, -1 before one */
  syncFullTick = -1
  readonly baselines: BaselineHistory

  violations = 0
  rateLimitedDrops = 0
  staleInputDrops = 0
  overflowDrops = 0

  /** Pending inputs by the tick they drive */
  private inputQueue = new Map<number, InputState>()
  private lastInputSeq = 0
  private lastAckSeq = 0
  private outboundSeq = 0
  private inputTokens: number
  private inputTokenLastRefillMs: number

  constructor(
    id: string,
    private readonly options: SessionOptions,
    nowMs: number
  ) {
    this.id = id
    this.baselines = new BaselineHistory(options.baselineHistory)
    this.inputTokens = options.inputRateBurst
    this.inputTokenLastRefillMs = nowMs
  }

  get isActive(): boolean {
    return this.state === 'synchronizing' || this.state === 'connected'
  }

  get queuedInputs(): number {
    return this.inputQueue.size
  }

  /** Sequence number for the next server → client message */
  nextSeq(): number {
    this.outboundSeq++
    return this.outboundSeq
  }

  /**
   * (Re)enter synchronizing: the next snapshot is full. Baselines are dropped
   * since none of them is known to have arrived.
   */
  beginSync(): void {
    if (this.state === 'disconnected') return
    this.state = 'synchronizing'
    this.lastAckedTick = 0
    this.syncFullTick = -1
    this.baselines.clear()
  }

  /** A fresh transport after reconnection; keeps the ship, drops stale traffic */
  resetTransport(nowMs: number): void {
    this.inputQueue.clear()
    this.lastInputSeq = 0
    this.lastAckSeq = 0
    this.inputTokens = this.options.inputRateBurst
    this.inputTokenLastRefillMs = nowMs
  }

  private consumeInputToken(nowMs: number): boolean {
    const elapsedMs = Math.max(0, nowMs - this.inputTokenLastRefillMs)
    if (elapsedMs > 0) {
      const refill = (elapsedMs / 1000) * this.options.inputRateLimitPerSecond
      this.inputTokens = Math.min(this.options.inputRateBurst, this.inputTokens + refill)
      this.inputTokenLastRefillMs = nowMs
    }

    if (this.inputTokens < 1) return false
    this.inputTokens -= 1
    return true
  }

  /**
   * Queue the inputs of a message.
   *
   * @param nextTick - The tick the server will advance next; anything older is stale
   */
  receiveInput(message: InputMessage, nextTick: number, nowMs: number): InputReceipt {
    if (!this.isActive) return 'ignored'
    if (message.seq <= this.lastInputSeq) return 'duplicate'
    if (!this.consumeInputToken(nowMs)) {
      this.rateLimitedDrops++
      return 'rate-limited'
    }
    this.lastInputSeq = message.seq

    let fresh = 0
    for (const { tick, input } of unpackInputs(message)) {
      if (tick < nextTick) continue
      if (this.inputQueue.has(tick)) continue
      this.inputQueue.set(tick, normalizeInput(input))
      fresh++
    }
    this.trimQueue()

    if (fresh === 0 && message.tick < nextTick) {
      this.staleInputDrops++
      return 'stale'
    }
    return 'accepted'
  }

  /** Keep the freshest inputs under pressure: drop the oldest ticks */
  private trimQueue(): void {
    if (this.inputQueue.size <= this.options.maxInputQueue) return
    const ticks = [...this.inputQueue.keys()].sort((a, b) => a - b)
    const excess = ticks.length - this.options.maxInputQueue
    for (let i = 0; i < excess; i++) {
      this.inputQueue.delete(ticks[i])
      this.overflowDrops++
    }
  }

  /**
   * Input for the tick being advanced, if one arrived. Older entries are
   * discarded.
   */
  takeInput(tick: number): InputState | undefined {
    for (const queued of this.inputQueue.keys()) {
      if (queued < tick) this.inputQueue.delete(queued)
    }
    const input = this.inputQueue.get(tick)
    this.inputQueue.delete(tick)
    return input
  }

  /**
   * Apply an ack. Acks of ticks that are not in the baseline history are
   * ignored; REQUEST_FULL sends the client back to synchronizing.
   *
   * The history is cleared when synchronizing begins, so while synchronizing
   * an ack of any recorded tick at or after the first full snapshot confirms
   * a full snapshot, however many newer ones have gone out since.
   */
  receiveAck(message: AckMessage): void {
    if (!this.isActive) return
    if (message.seq <= this.lastAckSeq) return
    this.lastAckSeq = message.seq

    if ((message.flags & ACK_REQUEST_FULL) !== 0) {
      this.beginSync()
      return
    }
    if (message.ackTick <= this.lastAckedTick) return
    if (!this.baselines.hasTick(message.ackTick)) return

    this.lastAckedTick = message.ackTick
    this.baselines.pruneBefore(message.ackTick)
    if (this.state === 'synchronizing' && this.syncFullTick >= 0 && message.ackTick >= this.syncFullTick) {
      this.state = 'connected'
    }
  }

  /**
   * Baseline for the next delta, or null when the next snapshot must be
   * full. A connected client whose acked baseline has aged out of the
   * history drops back to synchronizing.
   */
  deltaBase(): WorldSnapshot | null {
    if (this.state !== 'connected') return null
    const base = this.baselines.get(this.lastAckedTick)
    if (!base) {
      this.beginSync()
      return null
    }
    return base
  }

  /** Remember what was sent so a later ack can make it a baseline */
  recordSent(snapshot: WorldSnapshot, full: boolean): void {
    this.baselines.record(snapshot)
    if (full && this.syncFullTick < 0) this.syncFullTick = snapshot.tick
  }

  /**
   * Count a malformed message.
   *
   * @returns true once the client has used up its allowance
   */
  recordViolation(): boolean {
    this.violations++
    return this.violations >= this.options.maxProtocolViolations
  }

  /** Terminal. Releases the queue and baselines. */
  disconnect(): void {
    this.state = 'disconnected'
    this.shipId = NO_ENTITY
    this.inputQueue.clear()
    this.baselines.clear()
  }
}

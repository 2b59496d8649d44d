/**
 * SnapshotReceiver - client end of the replication protocol
 *
 * Decodes server messages, rebuilds deltas against a window of applied
 * snapshots and acknowledges every tick it applies. A delta whose base is
 * gone, or a silence longer than the timeout, sends the receiver back to
 * synchronizing with a REQUEST_FULL ack.
 *
 * - connecting: no running match, traffic is ignored
 * - synchronizing: waiting for a full snapshot
 * - connected: applying deltas
 * - disconnected: transport gone; beginSync() after a reconnect
 */

import {
  ACK_REQUEST_FULL,
  MessageKind,
  applyDelta,
  decodeServerMessage,
  encodeAck,
  isProtocolError,
  type GameEvent,
  type ServerMessage,
  type WorldSnapshot,
} from '@rubble/shared'

export type ReceiverState = 'connecting' | 'synchronizing' | 'connected' | 'disconnected'

export type Received =
  | { kind: 'snapshot'; snapshot: WorldSnapshot; full: boolean }
  | { kind: 'events'; tick: number; events: GameEvent[] }

export interface ReceiverOptions {
  /** Applied snapshots kept as delta bases */
  windowSize: number
  timeoutMs: number
  send: (bytes: Uint8Array) => void
  /** The client's estimate of the server tick, carried in acks */
  currentTick: () => number
}

export class SnapshotReceiver {
  private status: ReceiverState = 'connecting'
  /** Applied snapshots by tick, oldest first */
  private readonly window = new Map<number, WorldSnapshot>()
  private newest: WorldSnapshot | null = null
  private lastSeq = 0
  private ackSeq = 0
  private lastSnapshotAt = 0

  constructor(private readonly options: ReceiverOptions) {}

  get state(): ReceiverState {
    return this.status
  }

  /** Newest applied snapshot */
  get latest(): WorldSnapshot | null {
    return this.newest
  }

  get latestTick(): number {
    return this.newest?.tick ?? 0
  }

  /**
   * Start waiting for the first full snapshot of a match. Applied state is
   * dropped; the server resends everything under a fresh sequence.
   */
  beginSync(now: number): void {
    this.status = 'synchronizing'
    this.window.clear()
    this.newest = null
    this.lastSeq = 0
    this.lastSnapshotAt = now
  }

  /**
   * Handle one binary message from the server.
   *
   * @returns What was applied, or null if the message was dropped
   */
  receive(bytes: Uint8Array, now: number): Received | null {
    if (this.status === 'connecting' || this.status === 'disconnected') return null

    const message = this.decode(bytes)
    if (!message || message.seq <= this.lastSeq) return null
    this.lastSeq = message.seq

    switch (message.kind) {
      case MessageKind.FullSnapshot:
        return this.applyFull(message.snapshot, now)
      case MessageKind.DeltaSnapshot: {
        if (message.tick <= this.latestTick) return null
        const base = this.window.get(message.delta.baseTick)
        if (!base) {
          console.warn(`[NetworkClient] Delta for tick ${message.tick} references missing base ${message.delta.baseTick}`)
          this.requestFull()
          return null
        }
        let snapshot: WorldSnapshot
        try {
          snapshot = applyDelta(base, message.delta)
        } catch (error) {
          if (!isProtocolError(error)) throw error
          console.warn(`[NetworkClient] Bad delta for tick ${message.tick}: ${error.message}`)
          this.requestFull()
          return null
        }
        this.store(snapshot, now)
        return { kind: 'snapshot', snapshot, full: false }
      }
      case MessageKind.Event:
        return { kind: 'events', tick: message.tick, events: message.events }
    }
  }

  private decode(bytes: Uint8Array): ServerMessage | null {
    try {
      return decodeServerMessage(bytes)
    } catch (error) {
      if (!isProtocolError(error)) throw error
      console.warn(`[NetworkClient] Dropped server message: ${error.message}`)
      return null
    }
  }

  private applyFull(snapshot: WorldSnapshot, now: number): Received | null {
    if (snapshot.tick <= this.latestTick) return null
    this.store(snapshot, now)
    this.status = 'connected'
    return { kind: 'snapshot', snapshot, full: true }
  }

  private store(snapshot: WorldSnapshot, now: number): void {
    this.window.set(snapshot.tick, snapshot)
    while (this.window.size > this.options.windowSize) {
      const oldest = this.window.keys().next()
      if (oldest.done) break
      this.window.delete(oldest.value)
    }
    this.newest = snapshot
    this.lastSnapshotAt = now
    this.sendAck(snapshot.tick, 0)
  }

  /** Ask the server for a full snapshot and wait for it */
  requestFull(): void {
    if (this.status === 'connecting' || this.status === 'disconnected') return
    this.status = 'synchronizing'
    this.sendAck(this.latestTick, ACK_REQUEST_FULL)
  }

  /**
   * Request a full snapshot if none arrived for the timeout. The timer
   * restarts so a dead link is not flooded.
   *
   * @returns true if a request was sent
   */
  checkTimeout(now: number): boolean {
    if (this.status !== 'synchronizing' && this.status !== 'connected') return false
    if (now - this.lastSnapshotAt < this.options.timeoutMs) return false

    console.warn(`[NetworkClient] No snapshot for ${Math.round(now - this.lastSnapshotAt)}ms, requesting full`)
    this.lastSnapshotAt = now
    this.requestFull()
    return true
  }

  /** Match over: back to connecting until the next config */
  reset(): void {
    if (this.status === 'disconnected') return
    this.status = 'connecting'
    this.window.clear()
    this.newest = null
    this.lastSeq = 0
  }

  /** Transport gone: forget applied state and sequence numbers */
  disconnect(): void {
    this.status = 'disconnected'
    this.window.clear()
    this.newest = null
    this.lastSeq = 0
  }

  private sendAck(ackTick: number, flags: number): void {
    this.ackSeq++
    this.options.send(
      encodeAck({ seq: this.ackSeq, tick: Math.max(0, Math.floor(this.options.currentTick())), ackTick, flags })
    )
  }
}

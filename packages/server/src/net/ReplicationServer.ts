import {
  MAX_PLAYERS,
  MessageKind,
  NO_ENTITY,
  TICK_RATE,
  addPlayer,
  captureSnapshot,
  computeDelta,
  createDefaultSystems,
  decodeClientMessage,
  encodeDeltaSnapshot,
  encodeEventMessage,
  encodeFullSnapshot,
  finalScores,
  getEntity,
  initializeMatch,
  isMatchOver,
  isProtocolError,
  removePlayer,
  stepWorld,
  type ClientMessage,
  type FinalScore,
  type GameEvent,
  type GameWorld,
  type RosterEntry,
  type SimConfig,
  type SystemRegistry,
  type WorldSnapshot,
} from '@rubble/shared'
import { ClientSession, type SessionOptions } from './ClientSession'
import { InterestPolicy, filterEvents } from './InterestPolicy'

/** What the replication layer needs from a connection */
export interface Transport {
  send(bytes: Uint8Array): void
  /** Force the connection closed */
  disconnect(reason: string): void
}

export interface ReplicationOptions extends SessionOptions {
  snapshotIntervalTicks: number
  /** World pixels; 0 replicates everything */
  interestRadius: number
  simConfig?: Partial<SimConfig>
}

export interface TickResult {
  tick: number
  events: readonly GameEvent[]
  matchOver: boolean
}

interface Connection {
  session: ClientSession
  /** null while the client is away and may reconnect */
  transport: Transport | null
}

/** Drop counters are logged this often */
const TELEMETRY_INTERVAL_TICKS = TICK_RATE * 5

/**
 * Authoritative tick loop plus per-client replication, independent of the
 * transport. The room feeds it raw client traffic and calls step() at the
 * fixed rate; it answers through each client's Transport.
 *
 * Message handlers only queue; the world changes only inside step(),
 * initialize(), and when a client joins or leaves a running match.
 */
export class ReplicationServer {
  private world: GameWorld | null = null
  private readonly systems: SystemRegistry = createDefaultSystems()
  private readonly connections = new Map<string, Connection>()
  private readonly interest: InterestPolicy
  /** Events since the last snapshot round */
  private pendingEvents: GameEvent[] = []
  private running = false
  private lastTelemetryTick = 0

  constructor(private readonly options: ReplicationOptions) {
    this.interest = new InterestPolicy(options.interestRadius)
  }

  get isRunning(): boolean {
    return this.running
  }

  get tick(): number {
    return this.world?.tick ?? 0
  }

  get clientCount(): number {
    return this.connections.size
  }

  getWorld(): GameWorld | null {
    return this.world
  }

  getSession(id: string): ClientSession | undefined {
    return this.connections.get(id)?.session
  }

  /** Player slot for a client in the running match */
  getSlot(id: string): number | null {
    return this.world?.players.get(id)?.slot ?? null
  }

  /**
   * Start a match: create the world from the seed, spawn one ship per roster
   * entry and resynchronize every client.
   *
   * @throws If the roster is invalid (duplicates, too many players)
   */
  initialize(seed: number, roster: readonly RosterEntry[]): GameWorld {
    const world = initializeMatch(seed, roster, this.options.simConfig)
    this.world = world
    this.running = true
    this.pendingEvents = [...world.events]
    this.lastTelemetryTick = 0

    for (const [id, { session }] of this.connections) {
      session.shipId = world.players.get(id)?.shipId ?? NO_ENTITY
      session.beginSync()
    }
    console.log(`[Replication] Match started (seed=${seed}, players=${roster.length})`)
    return world
  }

  /**
   * Stop the match and disconnect every session.
   *
   * @returns Final standings, empty if no match ran
   */
  terminate(): FinalScore[] {
    const scores = this.world ? finalScores(this.world) : []
    this.running = false
    for (const { session } of this.connections.values()) {
      session.disconnect()
    }
    this.connections.clear()
    this.pendingEvents = []
    console.log(`[Replication] Match terminated at tick ${this.tick}`)
    return scores
  }

  /**
   * Register a client, or swap in a new transport for a reconnecting one.
   * A client joining a running match gets a ship while slots remain.
   */
  addClient(id: string, transport: Transport, nowMs: number): ClientSession {
    let session: ClientSession
    const existing = this.connections.get(id)
    if (existing) {
      existing.transport = transport
      session = existing.session
      session.resetTransport(nowMs)
    } else {
      session = new ClientSession(id, this.options, nowMs)
      this.connections.set(id, { session, transport })
    }

    if (this.running && this.world) {
      if (!this.world.players.has(id) && this.world.players.size < MAX_PLAYERS) {
        this.collectEvents(this.world, (world) => addPlayer(world, id))
      }
      session.shipId = this.world.players.get(id)?.shipId ?? NO_ENTITY
      session.beginSync()
    }
    return session
  }

  /**
   * The client's connection dropped but it may come back: stop sending, keep
   * its ship (which holds its last input, then idles).
   */
  suspendClient(id: string): void {
    const connection = this.connections.get(id)
    if (connection) connection.transport = null
  }

  /** Drop a client for good; its ship leaves the match */
  removeClient(id: string): void {
    const connection = this.connections.get(id)
    if (!connection) return
    connection.session.disconnect()
    this.connections.delete(id)
    if (this.running && this.world) {
      this.collectEvents(this.world, (world) => removePlayer(world, id))
    }
  }

  /**
   * Handle one binary message from a client. Malformed messages count as
   * protocol violations; too many disconnect the client.
   */
  receive(id: string, bytes: Uint8Array, nowMs: number): void {
    const connection = this.connections.get(id)
    if (!connection) return
    const message = this.decode(id, connection, bytes)
    if (!message) return

    switch (message.kind) {
      case MessageKind.Input:
        connection.session.receiveInput(message, this.tick + 1, nowMs)
        break
      case MessageKind.Ack:
        connection.session.receiveAck(message)
        break
    }
  }

  private decode(id: string, { session, transport }: Connection, bytes: Uint8Array): ClientMessage | null {
    try {
      return decodeClientMessage(bytes)
    } catch (error) {
      if (!isProtocolError(error)) throw error
      if (session.recordViolation()) {
        console.warn(`[Replication] ${id} disconnected after ${session.violations} protocol violations`)
        this.removeClient(id)
        transport?.disconnect('protocol violation')
      } else {
        console.warn(`[Replication] ${id} sent a bad message: ${error.message}`)
      }
      return null
    }
  }

  /**
   * Advance the match one tick: apply queued inputs, step, and on snapshot
   * ticks send every client its snapshot and the events since the last one
   * that touch what it sees.
   */
  step(): TickResult | null {
    const world = this.world
    if (!this.running || !world) return null

    const nextTick = world.tick + 1
    for (const { session } of this.connections.values()) {
      const input = session.takeInput(nextTick)
      if (input && session.shipId !== NO_ENTITY) {
        world.inputs.set(session.shipId, input)
      }
    }

    stepWorld(world, this.systems)
    this.pendingEvents.push(...world.events)

    for (const [id, { session }] of this.connections) {
      session.shipId = world.players.get(id)?.shipId ?? NO_ENTITY
    }

    if (world.tick % this.options.snapshotIntervalTicks === 0) {
      this.broadcastSnapshots(world)
    }
    this.maybeLogDrops(world)

    return { tick: world.tick, events: world.events, matchOver: isMatchOver(world) }
  }

  private broadcastSnapshots(world: GameWorld): void {
    const events = this.pendingEvents
    this.pendingEvents = []
    const exists = (entityId: number) => getEntity(world, entityId) !== undefined

    for (const { session, transport } of this.connections.values()) {
      if (!session.isActive || !transport) continue

      const filter = this.interest.filterFor(world, session.shipId)
      const snapshot = captureSnapshot(world, filter)
      const previous = session.baselines.getNewest()
      const base = session.deltaBase()
      const bytes = base
        ? encodeDeltaSnapshot(session.nextSeq(), computeDelta(base, snapshot, exists))
        : encodeFullSnapshot(session.nextSeq(), snapshot)
      session.recordSent(snapshot, base === null)
      transport.send(bytes)

      const heard = filter ? filterEvents(events, visibleIds(snapshot, previous)) : events
      if (heard.length > 0) {
        transport.send(encodeEventMessage(session.nextSeq(), world.tick, heard))
      }
    }
  }

  /** Run a world mutation outside the tick and keep the events it emits */
  private collectEvents(world: GameWorld, mutate: (world: GameWorld) => unknown): void {
    const before = world.events.length
    mutate(world)
    this.pendingEvents.push(...world.events.slice(before))
  }

  private maybeLogDrops(world: GameWorld): void {
    if (world.tick - this.lastTelemetryTick < TELEMETRY_INTERVAL_TICKS) return
    this.lastTelemetryTick = world.tick

    let rateLimited = 0
    let stale = 0
    let overflow = 0
    for (const { session } of this.connections.values()) {
      rateLimited += session.rateLimitedDrops
      stale += session.staleInputDrops
      overflow += session.overflowDrops
      session.rateLimitedDrops = 0
      session.staleInputDrops = 0
      session.overflowDrops = 0
    }

    if (rateLimited + stale + overflow > 0) {
      console.log(
        `[Replication][telemetry] input drops over last 5s: ${rateLimited} rate-limited, ${stale} stale, ${overflow} overflow`
      )
    }
  }
}

/** Entities a client sees now or saw in its previous snapshot, whose despawns it still needs */
function visibleIds(snapshot: WorldSnapshot, previous: WorldSnapshot | null): Set<number> {
  const ids = new Set<number>()
  for (const entity of snapshot.entities) ids.add(entity.id)
  if (previous) {
    for (const entity of previous.entities) ids.add(entity.id)
  }
  return ids
}

import { Room, type Client } from '@colyseus/core'
import {
  CLOSE_PROTOCOL_VIOLATION,
  MAX_PLAYERS,
  NO_ENTITY,
  RoomMessage,
  TICK_MS,
  TICK_RATE,
  isPingMessage,
  resolveSimConfig,
  type GameConfigMessage,
  type MatchEndedMessage,
  type PongMessage,
  type SimConfig,
} from '@rubble/shared'
import { loadServerConfig, type ServerConfig } from '../config'
import { ReplicationServer, type Transport } from '../net/ReplicationServer'
import { GameRoomState, PlayerMeta } from './schema/GameRoomState'

/** Maximum ticks to catch up in one update call (spiral-of-death protection) */
const MAX_CATCHUP_TICKS = 4

const MAX_NAME_LENGTH = 24

export interface GameRoomOptions {
  config?: ServerConfig
  simConfig?: Partial<SimConfig>
}

interface JoinOptions {
  name?: unknown
}

function playerName(client: Client, options?: JoinOptions): string {
  const name = options?.name
  if (typeof name === 'string' && name.trim().length > 0) {
    return name.trim().slice(0, MAX_NAME_LENGTH)
  }
  return client.sessionId.slice(0, 8)
}

/**
 * One match per room. Phases: lobby (waiting for start-match), playing (the
 * fixed-step loop runs), over (final scores are out; start-match plays again).
 *
 * The room owns the Colyseus side only: schema metadata, JSON control
 * messages and the reconnect window. Simulation and replication live in
 * ReplicationServer.
 */
export class GameRoom extends Room<GameRoomState> {
  override maxClients = MAX_PLAYERS

  private config!: ServerConfig
  private simConfig!: SimConfig
  private replication!: ReplicationServer
  private readonly members = new Map<string, Client>()
  /** Clients we closed ourselves; they get no reconnect window */
  private readonly kicked = new Set<string>()
  private accumulator = 0

  override onCreate(options: GameRoomOptions = {}) {
    this.config = options.config ?? loadServerConfig()
    this.simConfig = resolveSimConfig(options.simConfig)
    this.replication = new ReplicationServer({ ...this.config, simConfig: this.simConfig })

    this.setState(new GameRoomState())
    this.setPatchRate(100) // 10Hz schema sync for lobby metadata

    // Binary replication traffic: inputs and acks
    this.onMessage(RoomMessage.Replication, (client, data: unknown) => {
      this.guard(client, RoomMessage.Replication, () => {
        if (!(data instanceof Uint8Array)) {
          console.warn(`[GameRoom] ${client.sessionId} sent a non-binary replication message`)
          return
        }
        this.replication.receive(client.sessionId, data, performance.now())
      })
    })

    // Clock sync ping/pong handler
    this.onMessage(RoomMessage.Ping, (client, data: unknown) => {
      if (!isPingMessage(data)) return
      client.send(RoomMessage.Pong, {
        clientTime: data.clientTime,
        serverTime: performance.now(),
        serverTick: this.replication.tick,
      } satisfies PongMessage)
    })

    // Re-send authoritative game config when requested by clients (used after reconnect).
    this.onMessage(RoomMessage.RequestGameConfig, (client) => {
      if (!this.members.has(client.sessionId)) return
      this.sendGameConfig(client)
    })

    this.onMessage(RoomMessage.StartMatch, (client) => {
      this.guard(client, RoomMessage.StartMatch, () => {
        if (this.state.phase === 'playing') return
        this.startMatch()
      })
    })

    // Fixed-timestep simulation loop
    this.setSimulationInterval((deltaMs) => this.update(deltaMs), TICK_MS)

    console.log(
      `[GameRoom] Created (snapshot every ${this.config.snapshotIntervalTicks} ticks, interest radius ${this.config.interestRadius})`
    )
  }

  override onJoin(client: Client, options?: JoinOptions) {
    this.members.set(client.sessionId, client)

    const meta = new PlayerMeta()
    meta.name = playerName(client, options)
    this.state.players.set(client.sessionId, meta)

    this.replication.addClient(client.sessionId, this.transportFor(client), performance.now())
    this.syncPlayerMeta()
    this.sendGameConfig(client)

    console.log(
      `[GameRoom] ${client.sessionId} joined (phase=${this.state.phase}, slot=${this.replication.getSlot(client.sessionId) ?? '-'}, players=${this.members.size})`
    )
  }

  override async onLeave(client: Client, consented?: boolean) {
    const id = client.sessionId
    this.members.delete(id)
    const kicked = this.kicked.delete(id)

    if (!consented && !kicked && this.config.reconnectSeconds > 0) {
      this.replication.suspendClient(id)
      try {
        const reconnected = await this.allowReconnection(client, this.config.reconnectSeconds)
        this.members.set(id, reconnected)
        this.replication.addClient(id, this.transportFor(reconnected), performance.now())
        this.syncPlayerMeta()
        this.sendGameConfig(reconnected)
        console.log(`[GameRoom] ${id} reconnected`)
        return // Ship preserved
      } catch (error) {
        console.log(`[GameRoom] ${id} did not reconnect:`, error instanceof Error ? error.message : error)
      }
    }

    this.replication.removeClient(id)
    this.state.players.delete(id)
    console.log(`[GameRoom] ${id} left (players=${this.members.size})`)
  }

  override onDispose() {
    if (this.replication.isRunning) this.replication.terminate()
    this.members.clear()
    console.log('[GameRoom] Disposed')
  }

  /** Run a handler so one client's bad message never throws out of the room */
  private guard(client: Client, type: string, handler: () => void): void {
    try {
      handler()
    } catch (error) {
      console.error(`[GameRoom] ${type} from ${client.sessionId} failed:`, error)
    }
  }

  private transportFor(client: Client): Transport {
    return {
      send: (bytes) => client.sendBytes(RoomMessage.Replication, bytes),
      disconnect: (reason) => {
        this.kicked.add(client.sessionId)
        client.leave(CLOSE_PROTOCOL_VIOLATION, reason)
      },
    }
  }

  private startMatch(): void {
    const now = performance.now()
    const roster = [...this.members.keys()].map((playerId) => ({ playerId }))
    // Clients from a finished match were released by terminate(); register them again
    for (const [id, client] of this.members) {
      this.replication.addClient(id, this.transportFor(client), now)
    }

    const seed = this.config.seed ?? Date.now() >>> 0
    this.replication.initialize(seed, roster)
    this.accumulator = 0
    this.state.phase = 'playing'
    this.state.serverTick = this.replication.tick
    this.syncPlayerMeta()

    for (const client of this.members.values()) {
      this.sendGameConfig(client)
    }
    console.log(`[GameRoom] Phase → playing (players=${roster.length})`)
  }

  private endMatch(): void {
    const scores = this.replication.terminate()
    this.state.phase = 'over'
    this.syncPlayerMeta()

    const message: MatchEndedMessage = { scores }
    for (const client of this.members.values()) {
      client.send(RoomMessage.MatchEnded, message)
    }
    const winner = scores[0]
    console.log(`[GameRoom] Phase → over (winner=${winner ? `${winner.playerId} with ${winner.score}` : 'none'})`)
  }

  private sendGameConfig(client: Client): void {
    const id = client.sessionId
    client.send(RoomMessage.GameConfig, {
      sessionId: id,
      slot: this.replication.isRunning ? this.replication.getSlot(id) : null,
      shipId: this.replication.getSession(id)?.shipId ?? NO_ENTITY,
      tickRate: TICK_RATE,
      snapshotIntervalTicks: this.config.snapshotIntervalTicks,
      serverTick: this.replication.tick,
      simConfig: this.simConfig,
    } satisfies GameConfigMessage)
  }

  /** Mirror slot, score and liveness into the schema for lobby and scoreboard UIs */
  private syncPlayerMeta(): void {
    const world = this.replication.getWorld()
    for (const [id, meta] of this.state.players) {
      const record = world?.players.get(id)
      meta.slot = record?.slot ?? -1
      meta.score = record?.score ?? 0
      meta.alive = world !== null && record !== undefined && world.ships.has(record.shipId)
    }
  }

  private update(deltaMs: number) {
    if (this.state.phase !== 'playing') return

    this.accumulator += deltaMs
    let ticks = 0

    while (this.accumulator >= TICK_MS && ticks < MAX_CATCHUP_TICKS) {
      const result = this.replication.step()
      ticks++
      this.accumulator -= TICK_MS
      if (!result) return

      this.state.serverTick = result.tick
      if (result.tick % this.config.snapshotIntervalTicks === 0) {
        this.syncPlayerMeta()
      }
      if (result.matchOver) {
        this.endMatch()
        return
      }
    }

    // Spiral-of-death protection: drop accumulated time
    if (ticks >= MAX_CATCHUP_TICKS) {
      this.accumulator = 0
    }
  }
}

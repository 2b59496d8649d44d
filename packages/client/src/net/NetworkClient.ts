/**
 * Colyseus connection wrapper for multiplayer.
 *
 * Joins the game room, forwards binary replication traffic in both
 * directions, and dispatches control messages to listeners. Automatically
 * attempts reconnection on unexpected disconnects, except after the server
 * kicked the client for protocol violations.
 */

import { Client, type Room } from 'colyseus.js'
import {
  CLOSE_PROTOCOL_VIOLATION,
  RoomMessage,
  isMatchEndedMessage,
  isPongMessage,
  parseGameConfigMessage,
  type GameConfigMessage,
  type MatchEndedMessage,
  type MatchPhase,
  type PingMessage,
  type PongMessage,
} from '@rubble/shared'

/** The parts of a colyseus.js Room the client uses */
export interface RoomConnection {
  readonly reconnectionToken: string
  readonly state: unknown
  onMessage(type: string, cb: (payload: unknown) => void): () => void
  onLeave(cb: (code: number) => void): () => void
  onStateChange(cb: (state: unknown) => void): () => void
  send(type: string, payload?: unknown): void
  sendBytes(type: string, bytes: Uint8Array): void
  leave(): Promise<unknown>
}

export interface RoomConnector {
  joinOrCreate(roomName: string, options: JoinOptions): Promise<RoomConnection>
  reconnect(token: string): Promise<RoomConnection>
}

/** Where the reconnection token survives a page refresh */
export interface TokenStore {
  get(): string | null
  set(token: string): void
  clear(): void
}

export interface JoinOptions {
  name?: string
}

export interface PlayerView {
  sessionId: string
  name: string
  /** -1 without a ship in a running match */
  slot: number
  score: number
  alive: boolean
}

/** Room schema state, for lobby and scoreboard UIs */
export interface RoomStateView {
  phase: MatchPhase
  serverTick: number
  players: PlayerView[]
}

export type NetworkEventMap = {
  'game-config': [config: GameConfigMessage]
  replication: [bytes: Uint8Array]
  pong: [pong: PongMessage]
  'match-ended': [message: MatchEndedMessage]
  'room-state': [state: RoomStateView]
  reconnected: []
  disconnect: []
}

type NetworkListenerMap = {
  [K in keyof NetworkEventMap]: Set<(...args: NetworkEventMap[K]) => void>
}

export interface NetworkClientOptions {
  connector?: RoomConnector
  tokens?: TokenStore
  /** Waits between reconnect attempts */
  sleep?: (ms: number) => Promise<void>
}

const ROOM_NAME = 'game'
const TOKEN_KEY = 'rubble-reconnect-token'

/** Connection timeout in milliseconds */
const CONNECT_TIMEOUT_MS = 10_000

/** Reconnection settings */
const RECONNECT_MAX_ATTEMPTS = 5
const RECONNECT_BASE_DELAY_MS = 500
const RECONNECT_MAX_DELAY_MS = 8_000

function adaptRoom(room: Room): RoomConnection {
  return {
    get reconnectionToken() {
      return room.reconnectionToken
    },
    get state(): unknown {
      return room.state
    },
    onMessage: (type, cb) => room.onMessage(type, cb),
    onLeave: (cb) => {
      room.onLeave(cb)
      return () => room.onLeave.remove(cb)
    },
    onStateChange: (cb) => {
      room.onStateChange(cb)
      return () => room.onStateChange.remove(cb)
    },
    send: (type, payload) => room.send(type, payload),
    sendBytes: (type, bytes) => room.sendBytes(type, bytes),
    leave: () => room.leave(),
  }
}

/** RoomConnector over a colyseus.js Client */
export function colyseusConnector(endpoint: string): RoomConnector {
  const client = new Client(endpoint)
  return {
    joinOrCreate: async (roomName, options) => adaptRoom(await client.joinOrCreate(roomName, options)),
    reconnect: async (token) => adaptRoom(await client.reconnect(token)),
  }
}

/** sessionStorage where the host has it, memory otherwise */
export function sessionTokenStore(key = TOKEN_KEY): TokenStore {
  if (typeof sessionStorage !== 'undefined') {
    return {
      get: () => sessionStorage.getItem(key),
      set: (token) => sessionStorage.setItem(key, token),
      clear: () => sessionStorage.removeItem(key),
    }
  }
  let stored: string | null = null
  return {
    get: () => stored,
    set: (token) => {
      stored = token
    },
    clear: () => {
      stored = null
    },
  }
}

function defaultEndpoint(): string {
  const host = typeof window !== 'undefined' ? window.location.hostname : 'localhost'
  return `ws://${host}:2567`
}

function toBytes(data: unknown): Uint8Array | null {
  if (data instanceof Uint8Array) return data
  if (data instanceof ArrayBuffer) return new Uint8Array(data)
  return null
}

function isMatchPhase(value: unknown): value is MatchPhase {
  return value === 'lobby' || value === 'playing' || value === 'over'
}

/** Visit the entries of a MapSchema, Map or plain record */
function forEachEntry(collection: unknown, visit: (key: string, value: unknown) => void): void {
  if (collection instanceof Map) {
    for (const [key, value] of collection) visit(String(key), value)
    return
  }
  if (typeof collection !== 'object' || collection === null) return
  const forEach: unknown = Reflect.get(collection, 'forEach')
  if (typeof forEach === 'function') {
    Reflect.apply(forEach, collection, [(value: unknown, key: unknown) => visit(String(key), value)])
    return
  }
  for (const [key, value] of Object.entries(collection)) visit(key, value)
}

export function normalizeRoomState(state: unknown): RoomStateView | null {
  if (typeof state !== 'object' || state === null) return null
  const phase: unknown = Reflect.get(state, 'phase')
  const serverTick: unknown = Reflect.get(state, 'serverTick')

  const players: PlayerView[] = []
  forEachEntry(Reflect.get(state, 'players'), (sessionId, meta) => {
    if (typeof meta !== 'object' || meta === null) return
    const name: unknown = Reflect.get(meta, 'name')
    const slot: unknown = Reflect.get(meta, 'slot')
    const score: unknown = Reflect.get(meta, 'score')
    players.push({
      sessionId,
      name: typeof name === 'string' && name.length > 0 ? name : sessionId.slice(0, 8),
      slot: typeof slot === 'number' ? slot : -1,
      score: typeof score === 'number' ? score : 0,
      alive: Reflect.get(meta, 'alive') === true,
    })
  })

  return {
    phase: isMatchPhase(phase) ? phase : 'lobby',
    serverTick: typeof serverTick === 'number' ? serverTick : 0,
    players,
  }
}

export class NetworkClient {
  private readonly connector: RoomConnector
  private readonly tokens: TokenStore
  private readonly sleep: (ms: number) => Promise<void>
  private room: RoomConnection | null = null
  private latestGameConfig: GameConfigMessage | null = null
  private readonly listeners: NetworkListenerMap = {
    'game-config': new Set(),
    replication: new Set(),
    pong: new Set(),
    'match-ended': new Set(),
    'room-state': new Set(),
    reconnected: new Set(),
    disconnect: new Set(),
  }
  private cleanupRoomHandlers: (() => void) | null = null
  private reconnecting = false
  private intentionalLeave = false

  constructor(endpoint = defaultEndpoint(), options: NetworkClientOptions = {}) {
    this.connector = options.connector ?? colyseusConnector(endpoint)
    this.tokens = options.tokens ?? sessionTokenStore()
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
  }

  get isConnected(): boolean {
    return this.room !== null
  }

  on<K extends keyof NetworkEventMap>(event: K, cb: (...args: NetworkEventMap[K]) => void): () => void {
    this.listeners[event].add(cb)
    return () => {
      this.listeners[event].delete(cb)
    }
  }

  /**
   * Join (or rejoin with a stored token) and wait for the first game config.
   *
   * @throws If the room cannot be joined or no config arrives in time
   */
  async join(options: JoinOptions = {}): Promise<GameConfigMessage> {
    const room = await this.openRoom(options)
    this.room = room
    this.tokens.set(room.reconnectionToken)
    this.intentionalLeave = false

    // Wait for initial game-config before gameplay starts.
    const config = await this.waitForGameConfig(room)
    this.registerRoomHandlers(room)
    return config
  }

  private async openRoom(options: JoinOptions): Promise<RoomConnection> {
    // Try reconnecting with a stored token (survives page refresh)
    const storedToken = this.tokens.get()
    if (storedToken) {
      try {
        return await this.connector.reconnect(storedToken)
      } catch (error) {
        console.warn('[NetworkClient] Stored session expired, joining fresh:', error instanceof Error ? error.message : error)
        this.tokens.clear()
      }
    }

    try {
      return await this.connector.joinOrCreate(ROOM_NAME, options)
    } catch (error) {
      throw new Error(`Failed to connect: ${error instanceof Error ? error.message : 'Unknown error'}`)
    }
  }

  /** Send an encoded input or ack message */
  sendReplication(bytes: Uint8Array): void {
    this.room?.sendBytes(RoomMessage.Replication, bytes)
  }

  sendPing(clientTime: number): void {
    this.room?.send(RoomMessage.Ping, { clientTime } satisfies PingMessage)
  }

  startMatch(): void {
    this.room?.send(RoomMessage.StartMatch)
  }

  requestGameConfig(): void {
    this.room?.send(RoomMessage.RequestGameConfig)
  }

  getLatestGameConfig(): GameConfigMessage | null {
    return this.latestGameConfig
  }

  disconnect(): void {
    this.intentionalLeave = true
    this.tokens.clear()
    this.clearRoomHandlers()
    const room = this.room
    this.room = null
    this.latestGameConfig = null
    for (const set of Object.values(this.listeners)) set.clear()
    room?.leave().catch((error: unknown) => {
      console.warn('[NetworkClient] Failed to leave room:', error)
    })
  }

  private emit<K extends keyof NetworkEventMap>(event: K, ...args: NetworkEventMap[K]): void {
    for (const callback of [...this.listeners[event]]) {
      callback(...args)
    }
  }

  private clearRoomHandlers(): void {
    this.cleanupRoomHandlers?.()
    this.cleanupRoomHandlers = null
  }

  private acceptGameConfig(data: unknown): GameConfigMessage | null {
    const config = parseGameConfigMessage(data)
    if (!config) {
      console.warn('[NetworkClient] Ignoring malformed game-config')
      return null
    }
    this.latestGameConfig = config
    this.emit('game-config', config)
    return config
  }

  /** Register message, state and leave handlers on a room */
  private registerRoomHandlers(room: RoomConnection): void {
    this.clearRoomHandlers()
    const cleanup: Array<() => void> = []

    cleanup.push(
      room.onMessage(RoomMessage.GameConfig, (data) => {
        this.acceptGameConfig(data)
      })
    )

    cleanup.push(
      room.onMessage(RoomMessage.Replication, (data) => {
        const bytes = toBytes(data)
        if (!bytes) {
          console.warn('[NetworkClient] Ignoring non-binary replication message')
          return
        }
        this.emit('replication', bytes)
      })
    )

    cleanup.push(
      room.onMessage(RoomMessage.Pong, (data) => {
        if (isPongMessage(data)) this.emit('pong', data)
      })
    )

    cleanup.push(
      room.onMessage(RoomMessage.MatchEnded, (data) => {
        if (isMatchEndedMessage(data)) this.emit('match-ended', data)
      })
    )

    const emitRoomState = (state: unknown) => {
      const view = normalizeRoomState(state)
      if (view) this.emit('room-state', view)
    }
    cleanup.push(room.onStateChange(emitRoomState))
    emitRoomState(room.state)

    cleanup.push(room.onLeave((code) => this.handleLeave(code)))

    this.cleanupRoomHandlers = () => {
      for (const off of cleanup.splice(0)) {
        off()
      }
    }
  }

  private handleLeave(code: number): void {
    if (this.intentionalLeave) return
    if (code === CLOSE_PROTOCOL_VIOLATION) {
      console.warn('[NetworkClient] Disconnected by the server for protocol violations')
      this.intentionalLeave = true
      this.tokens.clear()
      this.clearRoomHandlers()
      this.room = null
      this.latestGameConfig = null
      this.emit('disconnect')
      return
    }
    this.attemptReconnect().catch((error: unknown) => {
      console.error('[NetworkClient] Reconnect failed:', error)
    })
  }

  /** Attempt reconnection with exponential backoff */
  private async attemptReconnect(): Promise<void> {
    const token = this.tokens.get()
    if (this.reconnecting || !token) {
      this.emit('disconnect')
      return
    }

    this.reconnecting = true
    this.clearRoomHandlers()
    this.room = null
    console.log('[NetworkClient] Connection lost, attempting reconnect...')

    for (let attempt = 0; attempt < RECONNECT_MAX_ATTEMPTS; attempt++) {
      const delay = Math.min(RECONNECT_BASE_DELAY_MS * Math.pow(2, attempt), RECONNECT_MAX_DELAY_MS)
      await this.sleep(delay)

      // Check if intentionally disconnected during wait
      if (this.intentionalLeave) {
        this.reconnecting = false
        return
      }

      try {
        const room = await this.connector.reconnect(token)
        this.room = room
        this.tokens.set(room.reconnectionToken)
        this.registerRoomHandlers(room)
        // The server sends a config on reconnect; ask again in case it raced the handlers
        this.requestGameConfig()
        this.reconnecting = false
        console.log(`[NetworkClient] Reconnected on attempt ${attempt + 1}`)
        this.emit('reconnected')
        return
      } catch (error) {
        console.log(
          `[NetworkClient] Reconnect attempt ${attempt + 1}/${RECONNECT_MAX_ATTEMPTS} failed:`,
          error instanceof Error ? error.message : error
        )
      }
    }

    // All attempts exhausted
    this.reconnecting = false
    this.tokens.clear()
    this.room = null
    this.emit('disconnect')
  }

  /**
   * Wait for a game-config message on a specific room.
   * The returned promise rejects on timeout or disconnection.
   */
  private waitForGameConfig(room: RoomConnection): Promise<GameConfigMessage> {
    return new Promise((resolve, reject) => {
      let settled = false
      const cleanup: Array<() => void> = []

      const finish = (fn: () => void) => {
        if (settled) return
        settled = true
        for (const off of cleanup) off()
        fn()
      }

      const timer = setTimeout(() => {
        finish(() => reject(new Error('Timed out waiting for game-config')))
      }, CONNECT_TIMEOUT_MS)
      cleanup.push(() => clearTimeout(timer))

      cleanup.push(
        room.onMessage(RoomMessage.GameConfig, (data) => {
          const config = this.acceptGameConfig(data)
          if (config) finish(() => resolve(config))
        })
      )

      cleanup.push(
        room.onLeave(() => {
          finish(() => reject(new Error('Disconnected before game-config received')))
        })
      )
    })
  }
}

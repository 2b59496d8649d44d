/**
 * Room control messages (JSON)
 *
 * Everything that is not per-tick replication: match lifecycle, the config
 * handshake, clock sync. Binary replication messages all share the
 * `replication` channel and are told apart by their envelope kind.
 */

import { parseSimConfig, type SimConfig } from '../sim/config'
import type { FinalScore } from '../sim/match'

export type MatchPhase = 'lobby' | 'playing' | 'over'

export const RoomMessage = {
  /** Binary, both directions */
  Replication: 'replication',
  Ping: 'ping',
  Pong: 'pong',
  GameConfig: 'game-config',
  RequestGameConfig: 'request-game-config',
  StartMatch: 'start-match',
  MatchEnded: 'match-ended',
} as const

/** WebSocket close code for a client kicked after repeated protocol violations */
export const CLOSE_PROTOCOL_VIOLATION = 4002

/** Server → client, on join, on match start and on request */
export interface GameConfigMessage {
  sessionId: string
  /** Player slot, or null while there is no running match */
  slot: number | null
  /** Ship this client controls, 0 if none */
  shipId: number
  tickRate: number
  snapshotIntervalTicks: number
  serverTick: number
  simConfig: SimConfig
}

/** Server → all clients once the match is over */
export interface MatchEndedMessage {
  scores: FinalScore[]
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v)
}

function isNonNegativeInteger(v: unknown): v is number {
  return isFiniteNumber(v) && Number.isInteger(v) && v >= 0
}

/**
 * Validate a game-config payload.
 *
 * @returns null if any field is missing or malformed
 */
export function parseGameConfigMessage(data: unknown): GameConfigMessage | null {
  if (typeof data !== 'object' || data === null) return null
  const sessionId: unknown = Reflect.get(data, 'sessionId')
  const slot: unknown = Reflect.get(data, 'slot')
  const shipId: unknown = Reflect.get(data, 'shipId')
  const tickRate: unknown = Reflect.get(data, 'tickRate')
  const snapshotIntervalTicks: unknown = Reflect.get(data, 'snapshotIntervalTicks')
  const serverTick: unknown = Reflect.get(data, 'serverTick')
  if (typeof sessionId !== 'string') return null
  if (slot !== null && !isNonNegativeInteger(slot)) return null
  if (!isNonNegativeInteger(shipId) || !isNonNegativeInteger(serverTick)) return null
  if (!isNonNegativeInteger(tickRate) || tickRate === 0) return null
  if (!isNonNegativeInteger(snapshotIntervalTicks) || snapshotIntervalTicks === 0) return null

  let simConfig: SimConfig
  try {
    simConfig = parseSimConfig(Reflect.get(data, 'simConfig'))
  } catch (error) {
    console.warn('[Protocol] Rejected game config:', error instanceof Error ? error.message : error)
    return null
  }
  return { sessionId, slot, shipId, tickRate, snapshotIntervalTicks, serverTick, simConfig }
}

export function isMatchEndedMessage(data: unknown): data is MatchEndedMessage {
  if (typeof data !== 'object' || data === null) return false
  const scores: unknown = Reflect.get(data, 'scores')
  return (
    Array.isArray(scores) &&
    scores.every(
      (entry: unknown) =>
        typeof entry === 'object' &&
        entry !== null &&
        typeof Reflect.get(entry, 'playerId') === 'string' &&
        isNonNegativeInteger(Reflect.get(entry, 'slot')) &&
        isFiniteNumber(Reflect.get(entry, 'score')) &&
        typeof Reflect.get(entry, 'survived') === 'boolean'
    )
  )
}

/**
 * Match Lifecycle
 *
 * The two externally invoked operations on the simulation core: start a
 * match from a seed and a roster, and end it with final scores.
 */

import { addPlayer } from './playerRegistry'
import { createGameWorld, type GameWorld } from './world'
import { resolveSimConfig, type SimConfig } from './config'

/** One participant, as known before the match starts */
export interface RosterEntry {
  playerId: string
}

export interface FinalScore {
  playerId: string
  slot: number
  score: number
  /** Whether the player's ship was still alive at the end */
  survived: boolean
}

/**
 * Create the world for a new match and spawn one ship per roster entry, in
 * roster order.
 *
 * @throws If the roster has duplicate ids or exceeds MAX_PLAYERS
 */
export function initializeMatch(
  seed: number,
  roster: readonly RosterEntry[],
  config: Partial<SimConfig> = {}
): GameWorld {
  const world = createGameWorld(seed, resolveSimConfig(config))
  for (const entry of roster) {
    addPlayer(world, entry.playerId)
  }
  return world
}

/**
 * Final standings: score descending, ties by slot.
 */
export function finalScores(world: GameWorld): FinalScore[] {
  return [...world.players.values()]
    .map((player) => ({
      playerId: player.playerId,
      slot: player.slot,
      score: player.score,
      survived: world.ships.has(player.shipId),
    }))
    .sort((a, b) => b.score - a.score || a.slot - b.slot)
}

/** A match is over once it has players and none of them has a ship left */
export function isMatchOver(world: GameWorld): boolean {
  if (world.players.size === 0) return false
  for (const player of world.players.values()) {
    if (world.ships.has(player.shipId)) return false
  }
  return true
}

/**
 * Player Registry
 *
 * Maps player ids (e.g. Colyseus session IDs) to slots and ships. Used at
 * match start for the roster and by the server for late joins and leaves.
 */

import { toFixed, QUARTER_TURN } from '../math/fixed'
import { NO_ENTITY, type EntityId, type Ship } from './entities'
import { despawnEntity, spawnShip } from './prefabs'
import type { GameWorld, PlayerRecord } from './world'

/** Maximum number of concurrent players */
export const MAX_PLAYERS = 8

/** Ships spawn facing up the screen */
export const SPAWN_HEADING = 3 * QUARTER_TURN

/** Spawn offsets from world center for each slot (symmetric layout) */
const SPAWN_OFFSETS: ReadonlyArray<{ dx: number; dy: number }> = [
  { dx: -120, dy: 0 },    // slot 0: left
  { dx: 120, dy: 0 },     // slot 1: right
  { dx: 0, dy: -120 },    // slot 2: up
  { dx: 0, dy: 120 },     // slot 3: down
  { dx: -120, dy: -120 }, // slot 4: top-left
  { dx: 120, dy: 120 },   // slot 5: bottom-right
  { dx: 120, dy: -120 },  // slot 6: top-right
  { dx: -120, dy: 120 },  // slot 7: bottom-left
]

/**
 * Find the lowest available slot not currently used by any player.
 */
function nextSlot(world: GameWorld): number {
  const usedSlots = new Set<number>()
  for (const info of world.players.values()) {
    usedSlots.add(info.slot)
  }
  for (let i = 0; i < MAX_PLAYERS; i++) {
    if (!usedSlots.has(i)) return i
  }
  return -1
}

/** Spawn point for a slot, in pixels */
export function spawnPoint(world: GameWorld, slot: number): { x: number; y: number } {
  const offset = SPAWN_OFFSETS[slot % SPAWN_OFFSETS.length]
  return {
    x: world.config.worldWidth / 2 + offset.dx,
    y: world.config.worldHeight / 2 + offset.dy,
  }
}

/**
 * Add a player to the world and spawn their ship.
 *
 * @param world - The game world
 * @param playerId - Unique player identifier
 * @returns The player's ship
 * @throws If playerId is already registered or the match is full
 */
export function addPlayer(world: GameWorld, playerId: string): Ship {
  if (world.players.has(playerId)) {
    throw new Error(`Player already registered: ${playerId}`)
  }

  const slot = nextSlot(world)
  if (slot === -1) {
    throw new Error(`Match is full (max ${MAX_PLAYERS} players)`)
  }

  const point = spawnPoint(world, slot)
  const ship = spawnShip(world, slot, toFixed(point.x), toFixed(point.y), SPAWN_HEADING)
  world.players.set(playerId, { playerId, slot, shipId: ship.id, score: 0 })
  return ship
}

/**
 * Remove a player and their ship.
 * Idempotent: no-op if the player is unknown.
 *
 * @returns The removed record, for final score reporting
 */
export function removePlayer(world: GameWorld, playerId: string): PlayerRecord | undefined {
  const info = world.players.get(playerId)
  if (!info) return undefined

  const ship = world.ships.get(info.shipId)
  if (ship) despawnEntity(world, ship, 'removed')
  world.players.delete(playerId)
  return info
}

/**
 * Get the ship id for a player, or undefined if not registered or destroyed.
 */
export function getPlayerShip(world: GameWorld, playerId: string): EntityId | undefined {
  const info = world.players.get(playerId)
  if (!info || info.shipId === NO_ENTITY) return undefined
  return info.shipId
}

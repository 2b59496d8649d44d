/**
 * World Hashing
 *
 * 32-bit FNV-1a over every field the simulation reads, in a canonical order.
 * Two worlds with equal hashes are, for all practical purposes, the same
 * state; used to check determinism and to compare replays.
 */

import { ENTITY_KIND_CODE, entityFields } from './entities'
import { sortedEntities, type GameWorld } from './world'

const FNV_OFFSET = 0x811c9dc5
const FNV_PRIME = 0x01000193

function mix(hash: number, value: number): number {
  // Hash all 32 bits of the value (and the sign above them) byte by byte
  let v = value | 0
  for (let i = 0; i < 4; i++) {
    hash = Math.imul(hash ^ (v & 0xff), FNV_PRIME)
    v >>>= 8
  }
  return Math.imul(hash ^ (value < 0 ? 1 : 0), FNV_PRIME)
}

/** Hash of the complete simulation state */
export function hashWorld(world: GameWorld): number {
  let hash = FNV_OFFSET
  hash = mix(hash, world.tick)
  hash = mix(hash, world.nextEntityId)
  hash = mix(hash, world.rng.getState())
  hash = mix(hash, world.spawnTimer)

  const entities = sortedEntities(world)
  hash = mix(hash, entities.length)
  for (const entity of entities) {
    hash = mix(hash, ENTITY_KIND_CODE[entity.kind])
    hash = mix(hash, entity.id)
    for (const field of entityFields(entity)) {
      hash = mix(hash, field)
    }
  }

  const players = [...world.players.values()].sort((a, b) => a.slot - b.slot)
  hash = mix(hash, players.length)
  for (const player of players) {
    hash = mix(hash, player.slot)
    hash = mix(hash, player.shipId)
    hash = mix(hash, player.score)
  }

  return hash >>> 0
}

/**
 * Damage Helpers
 *
 * Shared by the collision system for every pair type. Each helper records
 * its own events so the order of events follows the order of resolution.
 */

import { ANGLE_MASK, fpCos, fpMul, fpSin } from '../../math/fixed'
import { despawnEntity, spawnAsteroid } from '../prefabs'
import { getPlayerBySlot, type GameWorld } from '../world'
import type { Asteroid, EntityId, Ship } from '../entities'

/**
 * Damage a ship unless it is in grace. A ship that survives gets a fresh
 * grace window; one that drops to zero health is destroyed.
 *
 * @returns true if damage was applied
 */
export function damageShip(world: GameWorld, ship: Ship, amount: number, sourceId: EntityId): boolean {
  if (ship.graceTicks > 0 || amount <= 0) return false

  ship.health = Math.max(0, ship.health - amount)
  world.events.push({
    type: 'damage',
    tick: world.tick,
    entityId: ship.id,
    sourceId,
    amount,
    remaining: ship.health,
  })

  if (ship.health === 0) {
    despawnEntity(world, ship, 'destroyed')
  } else {
    ship.graceTicks = world.config.shipGraceTicks
  }
  return true
}

/** Credit points to the player in a slot */
export function awardScore(world: GameWorld, slot: number, points: number): void {
  const player = getPlayerBySlot(world, slot)
  if (!player || points <= 0) return
  player.score += points
  world.events.push({ type: 'score', tick: world.tick, slot, points, total: player.score })
}

/**
 * Break a large asteroid into small children fanned around its heading.
 * The parent is despawned first so its despawn event precedes the spawns.
 */
export function splitAsteroid(world: GameWorld, asteroid: Asteroid): void {
  const { config, constants } = world
  despawnEntity(world, asteroid, 'split')

  const n = config.splitCount
  for (let i = 0; i < n; i++) {
    const heading = (asteroid.heading + (2 * i - (n - 1)) * config.splitAngle) & ANGLE_MASK
    spawnAsteroid(world, {
      size: 'small',
      x: asteroid.x,
      y: asteroid.y,
      vx: asteroid.vx + fpMul(fpCos(heading), constants.splitSpeed),
      vy: asteroid.vy + fpMul(fpSin(heading), constants.splitSpeed),
      heading,
      graceTicks: config.childGraceTicks,
    })
  }
}

/**
 * Damage an asteroid. At zero health a large asteroid splits and a small one
 * is destroyed; the scorer (if any) is credited for the kill.
 *
 * @param scorerSlot - Slot of the player who fired, or null for ship rams
 */
export function damageAsteroid(
  world: GameWorld,
  asteroid: Asteroid,
  amount: number,
  sourceId: EntityId,
  scorerSlot: number | null
): void {
  asteroid.health = Math.max(0, asteroid.health - amount)
  world.events.push({
    type: 'damage',
    tick: world.tick,
    entityId: asteroid.id,
    sourceId,
    amount,
    remaining: asteroid.health,
  })
  if (asteroid.health > 0) return

  const large = asteroid.size === 'large'
  if (large) {
    splitAsteroid(world, asteroid)
  } else {
    despawnEntity(world, asteroid, 'destroyed')
  }

  if (scorerSlot !== null) {
    const { largeAsteroidScore, smallAsteroidScore } = world.config
    awardScore(world, scorerSlot, large ? largeAsteroidScore : smallAsteroidScore)
  }
}

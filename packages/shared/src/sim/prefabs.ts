/**
 * Entity Prefabs
 *
 * Factory functions that allocate an EntityId, insert the entity into its
 * variant map and record the spawn event. Removal goes through
 * despawnEntity so the despawn event is never skipped.
 */

import { fpCos, fpMul, fpSin, wrapCoord, type Angle, type Fixed } from '../math/fixed'
import { allocateEntityId, type GameWorld } from './world'
import type { DespawnReason } from './events'
import type { Asteroid, AsteroidSize, Entity, Projectile, Ship } from './entities'

/**
 * Spawn a ship for a player slot
 *
 * @param world - The game world
 * @param slot - Owning player slot (0-7)
 * @param x - Position X (fixed-point)
 * @param y - Position Y (fixed-point)
 * @param heading - Initial facing
 */
export function spawnShip(world: GameWorld, slot: number, x: Fixed, y: Fixed, heading: Angle): Ship {
  const { config, constants } = world
  const ship: Ship = {
    kind: 'ship',
    id: allocateEntityId(world),
    x,
    y,
    vx: 0,
    vy: 0,
    heading,
    radius: constants.shipRadius,
    health: config.shipHealth,
    slot,
    fuel: config.shipFuel,
    fireCooldown: 0,
    graceTicks: 0,
    thrust: 0,
    turn: 0,
    buttons: 0,
    inputAge: 0,
  }
  world.ships.set(ship.id, ship)
  world.events.push({ type: 'spawn', tick: world.tick, entityId: ship.id, kind: 'ship' })
  return ship
}

/** Options for spawning an asteroid */
export interface SpawnAsteroidOptions {
  size: AsteroidSize
  /** Position and velocity (fixed-point) */
  x: Fixed
  y: Fixed
  vx: Fixed
  vy: Fixed
  heading: Angle
  /** Ticks before the asteroid can collide (default: 0) */
  graceTicks?: number
}

export function spawnAsteroid(world: GameWorld, options: SpawnAsteroidOptions): Asteroid {
  const { config, constants } = world
  const large = options.size === 'large'
  const asteroid: Asteroid = {
    kind: 'asteroid',
    id: allocateEntityId(world),
    x: options.x,
    y: options.y,
    vx: options.vx,
    vy: options.vy,
    heading: options.heading,
    radius: large ? constants.largeAsteroidRadius : constants.smallAsteroidRadius,
    health: large ? config.largeAsteroidHealth : config.smallAsteroidHealth,
    size: options.size,
    graceTicks: options.graceTicks ?? 0,
    wrapsRemaining: config.asteroidWraps,
  }
  world.asteroids.set(asteroid.id, asteroid)
  world.events.push({ type: 'spawn', tick: world.tick, entityId: asteroid.id, kind: 'asteroid' })
  return asteroid
}

/**
 * Spawn a projectile at a ship's nose, inheriting the ship's velocity.
 */
export function spawnProjectile(world: GameWorld, ship: Ship): Projectile {
  const { config, constants } = world
  const dirX = fpCos(ship.heading)
  const dirY = fpSin(ship.heading)
  const projectile: Projectile = {
    kind: 'projectile',
    id: allocateEntityId(world),
    x: wrapCoord(ship.x + fpMul(dirX, ship.radius), constants.width),
    y: wrapCoord(ship.y + fpMul(dirY, ship.radius), constants.height),
    vx: ship.vx + fpMul(dirX, constants.projectileSpeed),
    vy: ship.vy + fpMul(dirY, constants.projectileSpeed),
    heading: ship.heading,
    radius: constants.projectileRadius,
    health: 1,
    ownerId: ship.id,
    ownerSlot: ship.slot,
    ttl: config.projectileTtlTicks,
    wrapsRemaining: config.projectileWraps,
  }
  world.projectiles.set(projectile.id, projectile)
  world.events.push({ type: 'spawn', tick: world.tick, entityId: projectile.id, kind: 'projectile' })
  return projectile
}

/**
 * Remove an entity from the world and record why.
 * Idempotent: no-op if the entity is already gone.
 */
export function despawnEntity(world: GameWorld, entity: Entity, reason: DespawnReason): void {
  let removed = false
  switch (entity.kind) {
    case 'ship':
      removed = world.ships.delete(entity.id)
      if (removed) {
        for (const player of world.players.values()) {
          if (player.shipId === entity.id) player.shipId = 0
        }
      }
      break
    case 'asteroid':
      removed = world.asteroids.delete(entity.id)
      break
    case 'projectile':
      removed = world.projectiles.delete(entity.id)
      break
  }
  if (!removed) return
  world.events.push({ type: 'despawn', tick: world.tick, entityId: entity.id, kind: entity.kind, reason })
}

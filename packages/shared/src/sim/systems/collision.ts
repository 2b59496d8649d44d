/**
 * Collision System
 *
 * Broad phase through the spatial hash, narrow phase as wrap-aware circle
 * overlap, then resolution in (minId, maxId) order. Sorting the pairs makes
 * the outcome independent of hash layout and candidate order: two pairs
 * that both involve one entity always resolve in the same order, and a pair
 * whose member died earlier in the tick is skipped.
 *
 * Interactions:
 * - ship / asteroid: asteroid breaks, ship takes collisionDamage
 * - projectile / asteroid: projectile spent, asteroid damaged (owner scores)
 * - projectile / ship: projectile spent, ship takes projectileDamage; never
 *   the projectile's own ship
 */

import { wrapDelta } from '../../math/fixed'
import { createSpatialHash, queryCandidates, rebuildSpatialHash } from '../SpatialHash'
import { despawnEntity } from '../prefabs'
import { getEntity, sortedEntities, type GameWorld } from '../world'
import type { Asteroid, Entity, EntityId, Projectile, Ship } from '../entities'
import { damageAsteroid, damageShip } from './damage'

/** Ordered id pair; first < second */
export type CollisionPair = readonly [EntityId, EntityId]

function collidable(entity: Entity): boolean {
  return entity.kind !== 'asteroid' || entity.graceTicks === 0
}

/** Whether two kinds of entity interact at all */
function interacts(a: Entity, b: Entity): boolean {
  if (a.kind === b.kind) return false
  if (a.kind === 'projectile' && b.kind === 'ship') return a.ownerId !== b.id
  if (a.kind === 'ship' && b.kind === 'projectile') return b.ownerId !== a.id
  return true
}

/** Wrap-aware circle overlap test */
export function entitiesOverlap(world: GameWorld, a: Entity, b: Entity): boolean {
  const { width, height } = world.constants
  const dx = wrapDelta(a.x - b.x, width)
  const dy = wrapDelta(a.y - b.y, height)
  const r = a.radius + b.radius
  return dx * dx + dy * dy < r * r
}

/**
 * Sort pairs by (min id, max id). Returns a new array; input order is
 * irrelevant to the result.
 */
export function sortCollisionPairs(pairs: readonly CollisionPair[]): CollisionPair[] {
  return pairs
    .map((pair): CollisionPair => (pair[0] < pair[1] ? pair : [pair[1], pair[0]]))
    .sort((p, q) => p[0] - q[0] || p[1] - q[1])
}

/**
 * Find every overlapping, interacting pair. Uses the world's spatial hash,
 * building it if this runs outside the normal pipeline.
 */
export function findCollisionPairs(world: GameWorld): CollisionPair[] {
  const { constants } = world
  const entities = sortedEntities(world)
  if (!world.spatialHash) {
    world.spatialHash = createSpatialHash(constants.width, constants.height, constants.cellSize)
    rebuildSpatialHash(world.spatialHash, entities)
  }
  const hash = world.spatialHash

  const pairs: CollisionPair[] = []
  for (const entity of entities) {
    if (!collidable(entity)) continue
    const candidates = queryCandidates(hash, entity.x, entity.y, entity.radius + constants.maxRadius, entity.id)
    for (const otherId of candidates) {
      if (otherId < entity.id) continue
      const other = getEntity(world, otherId)
      if (!other || !collidable(other) || !interacts(entity, other)) continue
      if (entitiesOverlap(world, entity, other)) {
        pairs.push([entity.id, otherId])
      }
    }
  }
  return pairs
}

function resolveShipAsteroid(world: GameWorld, ship: Ship, asteroid: Asteroid): void {
  damageAsteroid(world, asteroid, asteroid.health, ship.id, null)
  damageShip(world, ship, world.config.collisionDamage, asteroid.id)
}

function resolveProjectileAsteroid(world: GameWorld, projectile: Projectile, asteroid: Asteroid): void {
  despawnEntity(world, projectile, 'impact')
  damageAsteroid(world, asteroid, world.config.projectileDamage, projectile.id, projectile.ownerSlot)
}

function resolveProjectileShip(world: GameWorld, projectile: Projectile, ship: Ship): void {
  despawnEntity(world, projectile, 'impact')
  damageShip(world, ship, world.config.projectileDamage, projectile.id)
}

function resolvePair(world: GameWorld, a: Entity, b: Entity): void {
  if (a.kind === 'ship' && b.kind === 'asteroid') return resolveShipAsteroid(world, a, b)
  if (b.kind === 'ship' && a.kind === 'asteroid') return resolveShipAsteroid(world, b, a)
  if (a.kind === 'projectile' && b.kind === 'asteroid') return resolveProjectileAsteroid(world, a, b)
  if (b.kind === 'projectile' && a.kind === 'asteroid') return resolveProjectileAsteroid(world, b, a)
  if (a.kind === 'projectile' && b.kind === 'ship') return resolveProjectileShip(world, a, b)
  if (b.kind === 'projectile' && a.kind === 'ship') return resolveProjectileShip(world, b, a)
}

/**
 * Resolve pairs in sorted order. Pairs referring to entities removed earlier
 * in the same resolution pass are skipped.
 */
export function resolveCollisionPairs(world: GameWorld, pairs: readonly CollisionPair[]): void {
  for (const [idA, idB] of sortCollisionPairs(pairs)) {
    const a = getEntity(world, idA)
    const b = getEntity(world, idB)
    if (!a || !b) continue
    resolvePair(world, a, b)
  }
}

export function collisionSystem(world: GameWorld): void {
  resolveCollisionPairs(world, findCollisionPairs(world))
}

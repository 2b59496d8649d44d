/**
 * Simulation Systems
 *
 * The pipeline below is the simulation's tick order. Client and server must
 * register exactly this sequence.
 */

import { createSystemRegistry, type SystemRegistry } from '../step'

import { timerSystem } from './timers'
import { shipControlSystem } from './shipControl'
import { asteroidSpawnerSystem } from './asteroidSpawner'
import { movementSystem } from './movement'
import { spatialHashSystem } from './spatialHash'
import { collisionSystem } from './collision'
import { projectileLifetimeSystem } from './projectileLifetime'

export {
  timerSystem,
  shipControlSystem,
  asteroidSpawnerSystem,
  movementSystem,
  spatialHashSystem,
  collisionSystem,
  projectileLifetimeSystem,
}

export {
  findCollisionPairs,
  resolveCollisionPairs,
  sortCollisionPairs,
  entitiesOverlap,
  type CollisionPair,
} from './collision'
export { damageShip, damageAsteroid, splitAsteroid, awardScore } from './damage'

/**
 * Register all systems in the correct execution order
 */
export function registerAllSystems(registry: SystemRegistry): void {
  // Grace timers count down before anything can collide this tick
  registry.register(timerSystem)

  // Inputs → heading, velocity, new projectiles
  registry.register(shipControlSystem)
  registry.register(asteroidSpawnerSystem)

  // Integrate and wrap
  registry.register(movementSystem)

  // Broad phase, then narrow phase + resolution
  registry.register(spatialHashSystem)
  registry.register(collisionSystem)

  // Projectiles that survived collision age out
  registry.register(projectileLifetimeSystem)
}

/** A registry with the full pipeline registered */
export function createDefaultSystems(): SystemRegistry {
  const registry = createSystemRegistry()
  registerAllSystems(registry)
  return registry
}

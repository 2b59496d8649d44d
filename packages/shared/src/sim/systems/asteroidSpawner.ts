/**
 * Asteroid Spawner System
 *
 * Every `asteroidSpawnIntervalTicks`, spawns one asteroid on the top or left
 * edge of the world. All randomness comes from the world RNG so clients
 * replaying the same ticks spawn the same asteroids with the same ids.
 */

import { ANGLE_UNITS } from '../../math/fixed'
import { spawnAsteroid } from '../prefabs'
import type { GameWorld } from '../world'

export function asteroidSpawnerSystem(world: GameWorld): void {
  const { config, constants, rng } = world
  if (config.asteroidSpawnIntervalTicks === 0) return

  world.spawnTimer--
  if (world.spawnTimer > 0) return
  world.spawnTimer = config.asteroidSpawnIntervalTicks

  const size = rng.chance(config.largeAsteroidChance) ? 'large' : 'small'
  const onTopEdge = rng.nextInt(2) === 0
  const x = onTopEdge ? rng.nextInt(constants.width) : 0
  const y = onTopEdge ? 0 : rng.nextInt(constants.height)
  const speed = constants.maxAsteroidSpeed

  spawnAsteroid(world, {
    size,
    x,
    y,
    vx: rng.nextIntRange(-speed, speed),
    vy: rng.nextIntRange(-speed, speed),
    heading: rng.nextInt(ANGLE_UNITS),
  })
}

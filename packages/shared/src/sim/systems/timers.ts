import type { GameWorld } from '../world'

/**
 * Count down grace timers: ship damage immunity and the collision-free
 * window of freshly split asteroids.
 */
export function timerSystem(world: GameWorld): void {
  for (const ship of world.ships.values()) {
    if (ship.graceTicks > 0) ship.graceTicks--
  }
  for (const asteroid of world.asteroids.values()) {
    if (asteroid.graceTicks > 0) asteroid.graceTicks--
  }
}

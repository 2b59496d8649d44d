import { despawnEntity } from '../prefabs'
import { sortedValues, type GameWorld } from '../world'

/**
 * Projectile lifetime system - counts down time-to-live and despawns
 * projectiles that run out. Runs after collision, so a projectile can still
 * hit something on its final tick.
 */
export function projectileLifetimeSystem(world: GameWorld): void {
  for (const projectile of sortedValues(world.projectiles)) {
    projectile.ttl--
    if (projectile.ttl <= 0) {
      despawnEntity(world, projectile, 'expired')
    }
  }
}

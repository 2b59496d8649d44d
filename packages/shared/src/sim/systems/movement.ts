/**
 * Movement System
 *
 * Integrates position by velocity and wraps everything onto the torus.
 * Asteroids and projectiles carry a wrap allowance; crossing an edge with
 * none left despawns them.
 */

import { wrapCoord } from '../../math/fixed'
import { despawnEntity } from '../prefabs'
import { sortedEntities, type GameWorld } from '../world'

export function movementSystem(world: GameWorld): void {
  const { width, height } = world.constants

  for (const entity of sortedEntities(world)) {
    const nx = entity.x + entity.vx
    const ny = entity.y + entity.vy
    entity.x = wrapCoord(nx, width)
    entity.y = wrapCoord(ny, height)

    const wrapped = entity.x !== nx || entity.y !== ny
    if (!wrapped || entity.kind === 'ship') continue

    if (entity.wrapsRemaining === 0) {
      despawnEntity(world, entity, 'wrapped')
    } else {
      entity.wrapsRemaining--
    }
  }
}

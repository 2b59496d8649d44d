import { createSpatialHash, rebuildSpatialHash } from '../SpatialHash'
import { sortedEntities, type GameWorld } from '../world'

/**
 * Spatial hash system - rebuilds the broad-phase grid from current positions.
 * Must run after movement and before collision.
 */
export function spatialHashSystem(world: GameWorld): void {
  const { width, height, cellSize } = world.constants
  if (!world.spatialHash) {
    world.spatialHash = createSpatialHash(width, height, cellSize)
  }
  rebuildSpatialHash(world.spatialHash, sortedEntities(world))
}

import {
  createSpatialHash,
  forEachInRadius,
  getEntity,
  rebuildSpatialHash,
  sortedEntities,
  toFixed,
  toFloat,
  wrapDelta,
  type Entity,
  type EntityId,
  type GameEvent,
  type GameWorld,
  type SpatialHash,
} from '@rubble/shared'

export type InterestFilter = (entity: Entity) => boolean

/**
 * Events for a client with a filtered view: those touching an entity in
 * `visible`. Score events concern players, not entities, and always pass.
 */
export function filterEvents(events: readonly GameEvent[], visible: ReadonlySet<EntityId>): GameEvent[] {
  return events.filter((event) => {
    switch (event.type) {
      case 'score':
        return true
      case 'damage':
        return visible.has(event.entityId) || visible.has(event.sourceId)
      case 'spawn':
      case 'despawn':
        return visible.has(event.entityId)
    }
  })
}

/**
 * Decides which entities each client hears about. With a radius of 0 every
 * client gets the whole world; otherwise a client sees what overlaps a
 * circle around its ship (wrap-aware), plus the ship itself. Clients without
 * a ship see everything.
 *
 * The policy keeps its own grid, rebuilt at most once per world tick, since
 * the simulation's grid does not index entities spawned during collision
 * resolution.
 */
export class InterestPolicy {
  private hash: SpatialHash | null = null
  private indexedWorld: GameWorld | null = null
  private indexedTick = -1

  /** @param radius - World pixels; 0 disables filtering */
  constructor(private readonly radius: number) {}

  get enabled(): boolean {
    return this.radius > 0
  }

  /** @returns undefined when the client should see everything */
  filterFor(world: GameWorld, shipId: EntityId): InterestFilter | undefined {
    if (!this.enabled) return undefined
    const ship = world.ships.get(shipId)
    if (!ship) return undefined

    const hash = this.index(world)
    const { width, height, maxRadius } = world.constants
    const radius = toFixed(this.radius)
    const ids = new Set<EntityId>([ship.id])

    forEachInRadius(hash, ship.x, ship.y, radius + maxRadius, (id) => {
      const entity = getEntity(world, id)
      if (!entity) return
      const dx = toFloat(wrapDelta(entity.x - ship.x, width))
      const dy = toFloat(wrapDelta(entity.y - ship.y, height))
      const reach = this.radius + toFloat(entity.radius)
      if (dx * dx + dy * dy <= reach * reach) ids.add(id)
    })

    return (entity) => ids.has(entity.id)
  }

  private index(world: GameWorld): SpatialHash {
    const { width, height, cellSize } = world.constants
    if (!this.hash || this.indexedWorld !== world) {
      this.hash = createSpatialHash(width, height, cellSize)
      this.indexedTick = -1
    }
    if (this.indexedWorld !== world || this.indexedTick !== world.tick) {
      rebuildSpatialHash(this.hash, sortedEntities(world))
      this.indexedWorld = world
      this.indexedTick = world.tick
    }
    return this.hash
  }
}

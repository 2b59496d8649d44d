/**
 * Presentation view of the predicted world.
 *
 * Renderers get float pixels and radians, never fixed-point state, and never
 * a reference into the simulation.
 */

import {
  Vec2,
  angleToRadians,
  isShip,
  sortedEntities,
  toFloat,
  wrapCoord,
  type AsteroidSize,
  type Entity,
  type EntityId,
  type EntityKind,
  type GameWorld,
  type SimConfig,
} from '@rubble/shared'
import type { InterpolationState } from '../net/SnapshotBuffer'

export interface RenderEntity {
  readonly id: EntityId
  readonly kind: EntityKind
  /** World pixels */
  readonly x: number
  readonly y: number
  /** Radians */
  readonly rotation: number
  readonly radius: number
  readonly health: number
  /** Asteroid size tier, null for other kinds */
  readonly size: AsteroidSize | null
  /** The ship this client controls */
  readonly local: boolean
}

/** Where to draw an entity instead of its predicted position */
export interface RemotePose {
  x: number
  y: number
  rotation: number
}

export interface RenderViewOptions {
  localShipId?: EntityId
  /** Added to the local ship's position (world pixels) */
  correction?: { x: number; y: number }
  /** Overrides for remote entities, e.g. sampled from the snapshot buffer */
  remote?: ReadonlyMap<EntityId, RemotePose>
}

function pose(
  config: Readonly<SimConfig>,
  from: Entity | undefined,
  to: Entity,
  alpha: number
): RemotePose {
  const x = toFloat(to.x)
  const y = toFloat(to.y)
  const rotation = angleToRadians(to.heading)
  if (!from) return { x, y, rotation }
  return {
    x: Vec2.lerpWrapped(toFloat(from.x), x, alpha, config.worldWidth),
    y: Vec2.lerpWrapped(toFloat(from.y), y, alpha, config.worldHeight),
    rotation: Vec2.lerpAngle(angleToRadians(from.heading), rotation, alpha),
  }
}

function entityIn(world: GameWorld, entity: Entity): Entity | undefined {
  switch (entity.kind) {
    case 'ship':
      return world.ships.get(entity.id)
    case 'asteroid':
      return world.asteroids.get(entity.id)
    case 'projectile':
      return world.projectiles.get(entity.id)
  }
}

/**
 * Interpolate between the last two predicted states, taking the short way
 * across world edges. Entities that only exist in `curr` are drawn where
 * they are. The correction offset is applied to the local ship only.
 */
export function buildRenderView(
  prev: GameWorld,
  curr: GameWorld,
  alpha: number,
  options: RenderViewOptions = {}
): RenderEntity[] {
  const { config } = curr
  const t = Math.max(0, Math.min(1, alpha))
  const out: RenderEntity[] = []

  for (const entity of sortedEntities(curr)) {
    const local = entity.id === options.localShipId
    const override = local ? undefined : options.remote?.get(entity.id)
    const base = override ?? pose(config, entityIn(prev, entity), entity, t)
    let x = base.x
    let y = base.y
    if (local && options.correction) {
      x = wrapCoord(x + options.correction.x, config.worldWidth)
      y = wrapCoord(y + options.correction.y, config.worldHeight)
    }
    out.push({
      id: entity.id,
      kind: entity.kind,
      x,
      y,
      rotation: base.rotation,
      radius: toFloat(entity.radius),
      health: entity.health,
      size: entity.kind === 'asteroid' ? entity.size : null,
      local,
    })
  }
  return out
}

/**
 * Poses for remote ships from buffered server snapshots, for drawing other
 * players where the server last saw them rather than where prediction
 * guesses they are.
 */
export function sampleRemoteShips(
  state: InterpolationState,
  config: Readonly<SimConfig>,
  localShipId: EntityId
): Map<EntityId, RemotePose> {
  const previous = new Map<EntityId, Entity>()
  for (const entity of state.from.entities) {
    if (isShip(entity)) previous.set(entity.id, entity)
  }

  const poses = new Map<EntityId, RemotePose>()
  for (const entity of state.to.entities) {
    if (!isShip(entity) || entity.id === localShipId) continue
    poses.set(entity.id, pose(config, previous.get(entity.id), entity, state.alpha))
  }
  return poses
}

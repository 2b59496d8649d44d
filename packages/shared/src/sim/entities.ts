/**
 * Entity Definitions
 *
 * Entities are plain records stored in per-variant maps on the world, keyed
 * by EntityId. All numeric fields are integers (see math/fixed.ts), so a
 * record copies, hashes and serializes exactly.
 */

import type { Angle, Fixed } from '../math/fixed'

/** Network-visible entity identifier. Allocated by the world, never reused. 0 means none. */
export type EntityId = number

export const NO_ENTITY: EntityId = 0

export type EntityKind = 'ship' | 'asteroid' | 'projectile'

export type AsteroidSize = 'large' | 'small'

/** Wire and hash code for each kind */
export const ENTITY_KIND_CODE: Readonly<Record<EntityKind, number>> = { ship: 1, asteroid: 2, projectile: 3 }

const KIND_BY_CODE: readonly (EntityKind | undefined)[] = [undefined, 'ship', 'asteroid', 'projectile']

export function entityKindFromCode(code: number): EntityKind | undefined {
  return KIND_BY_CODE[code]
}

/** Fields every simulated body has */
interface Body {
  id: EntityId
  /** Position (fixed-point world pixels) */
  x: Fixed
  y: Fixed
  /** Velocity (fixed-point pixels per tick) */
  vx: Fixed
  vy: Fixed
  heading: Angle
  /** Collision radius (fixed-point) */
  radius: Fixed
  health: number
}

export interface Ship extends Body {
  kind: 'ship'
  /** Owning player's slot */
  slot: number
  fuel: number
  fireCooldown: number
  graceTicks: number
  /** Last applied input, quantized: thrust 0..127, turn -127..127 */
  thrust: number
  turn: number
  buttons: number
  /** Ticks since a fresh input was applied */
  inputAge: number
}

export interface Asteroid extends Body {
  kind: 'asteroid'
  size: AsteroidSize
  /** Collisions are ignored while > 0 */
  graceTicks: number
  wrapsRemaining: number
}

export interface Projectile extends Body {
  kind: 'projectile'
  ownerId: EntityId
  ownerSlot: number
  ttl: number
  wrapsRemaining: number
}

export type Entity = Ship | Asteroid | Projectile

export function isShip(entity: Entity): entity is Ship {
  return entity.kind === 'ship'
}

export function isAsteroid(entity: Entity): entity is Asteroid {
  return entity.kind === 'asteroid'
}

export function isProjectile(entity: Entity): entity is Projectile {
  return entity.kind === 'projectile'
}

// ============================================================================
// Field vectors
// ============================================================================

/**
 * Every state field after `id`, in a fixed order per variant. The wire codec
 * and the world hash both walk this order; a delta's field mask indexes it.
 */
export const ENTITY_FIELDS = {
  ship: [
    'x', 'y', 'vx', 'vy', 'heading', 'radius', 'health',
    'slot', 'fuel', 'fireCooldown', 'graceTicks', 'thrust', 'turn', 'buttons', 'inputAge',
  ],
  asteroid: ['x', 'y', 'vx', 'vy', 'heading', 'radius', 'health', 'size', 'graceTicks', 'wrapsRemaining'],
  projectile: [
    'x', 'y', 'vx', 'vy', 'heading', 'radius', 'health',
    'ownerId', 'ownerSlot', 'ttl', 'wrapsRemaining',
  ],
} as const satisfies Record<EntityKind, readonly string[]>

const SIZE_CODE: Record<AsteroidSize, number> = { small: 0, large: 1 }

export function entityFields(entity: Entity): number[] {
  const common = [entity.x, entity.y, entity.vx, entity.vy, entity.heading, entity.radius, entity.health]
  switch (entity.kind) {
    case 'ship':
      return [
        ...common,
        entity.slot,
        entity.fuel,
        entity.fireCooldown,
        entity.graceTicks,
        entity.thrust,
        entity.turn,
        entity.buttons,
        entity.inputAge,
      ]
    case 'asteroid':
      return [...common, SIZE_CODE[entity.size], entity.graceTicks, entity.wrapsRemaining]
    case 'projectile':
      return [...common, entity.ownerId, entity.ownerSlot, entity.ttl, entity.wrapsRemaining]
  }
}

/**
 * Inverse of entityFields.
 *
 * @throws If the vector has the wrong length or an asteroid size code is unknown
 */
export function entityFromFields(kind: EntityKind, id: EntityId, fields: readonly number[]): Entity {
  if (fields.length !== ENTITY_FIELDS[kind].length) {
    throw new Error(`Expected ${ENTITY_FIELDS[kind].length} fields for ${kind}, got ${fields.length}`)
  }
  const [x, y, vx, vy, heading, radius, health] = fields
  switch (kind) {
    case 'ship':
      return {
        kind,
        id,
        x,
        y,
        vx,
        vy,
        heading,
        radius,
        health,
        slot: fields[7],
        fuel: fields[8],
        fireCooldown: fields[9],
        graceTicks: fields[10],
        thrust: fields[11],
        turn: fields[12],
        buttons: fields[13],
        inputAge: fields[14],
      }
    case 'asteroid': {
      const sizeCode = fields[7]
      if (sizeCode !== SIZE_CODE.small && sizeCode !== SIZE_CODE.large) {
        throw new Error(`Unknown asteroid size code: ${sizeCode}`)
      }
      return {
        kind,
        id,
        x,
        y,
        vx,
        vy,
        heading,
        radius,
        health,
        size: sizeCode === SIZE_CODE.large ? 'large' : 'small',
        graceTicks: fields[8],
        wrapsRemaining: fields[9],
      }
    }
    case 'projectile':
      return {
        kind,
        id,
        x,
        y,
        vx,
        vy,
        heading,
        radius,
        health,
        ownerId: fields[7],
        ownerSlot: fields[8],
        ttl: fields[9],
        wrapsRemaining: fields[10],
      }
  }
}

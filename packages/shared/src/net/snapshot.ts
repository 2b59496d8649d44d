/**
 * Snapshot Serialization
 *
 * Full and delta snapshots of the world as one client sees it (its interest
 * set), plus the world metadata prediction needs to replay spawns exactly.
 *
 * Entity records are `kind u8 | id u32 | fields i32...` with the field order
 * from ENTITY_FIELDS. Simulation state is integer, so a decoded snapshot
 * restores a world bit-identical to the one captured.
 *
 * Full payload:
 *   meta | players | u16 count | entity records
 *
 * Delta payload:
 *   u32 baseTick | meta | players
 *   u16 created  | entity records
 *   u16 updated  | (u32 id, u16 mask, i32 per set bit)
 *   u16 removed  | (u32 id, u8 reason)
 */

import { createGameWorld, sortedEntities, type GameWorld, type PlayerRecord } from '../sim/world'
import { DEFAULT_SIM_CONFIG, type SimConfig } from '../sim/config'
import {
  ENTITY_FIELDS,
  ENTITY_KIND_CODE,
  entityKindFromCode,
  entityFields,
  entityFromFields,
  type Entity,
  type EntityId,
  type EntityKind,
} from '../sim/entities'
import {
  BinaryReader,
  BinaryWriter,
  MessageKind,
  ProtocolError,
  writeEnvelope,
} from './wire'

// ============================================================================
// Types
// ============================================================================

/** World-level state replicated alongside entities */
export interface WorldMeta {
  nextEntityId: EntityId
  rngState: number
  spawnTimer: number
}

export interface WorldSnapshot {
  tick: number
  meta: WorldMeta
  /** Sorted by slot */
  players: PlayerRecord[]
  /** Sorted by id */
  entities: Entity[]
}

/** Changed fields of an entity the client already has */
export interface EntityUpdate {
  id: EntityId
  /** Bit i set = field i of ENTITY_FIELDS[kind] changed */
  mask: number
  /** New values of the set bits, in ascending bit order */
  values: number[]
}

export const RemovalReason = {
  /** Gone from the world */
  Despawned: 0,
  /** Still alive, but left the client's interest set */
  OutOfInterest: 1,
} as const

export type RemovalReason = (typeof RemovalReason)[keyof typeof RemovalReason]

function isRemovalReason(value: number): value is RemovalReason {
  return value === RemovalReason.Despawned || value === RemovalReason.OutOfInterest
}

export interface EntityRemoval {
  id: EntityId
  reason: RemovalReason
}

export interface SnapshotDelta {
  tick: number
  baseTick: number
  meta: WorldMeta
  players: PlayerRecord[]
  created: Entity[]
  updated: EntityUpdate[]
  removed: EntityRemoval[]
}

// ============================================================================
// Capture / restore
// ============================================================================

function copyEntity(entity: Entity): Entity {
  return { ...entity }
}

/**
 * Capture the world at its current tick.
 *
 * @param include - Interest filter; every entity when omitted
 */
export function captureSnapshot(world: GameWorld, include?: (entity: Entity) => boolean): WorldSnapshot {
  const entities: Entity[] = []
  for (const entity of sortedEntities(world)) {
    if (!include || include(entity)) entities.push(copyEntity(entity))
  }
  return {
    tick: world.tick,
    meta: {
      nextEntityId: world.nextEntityId,
      rngState: world.rng.getState(),
      spawnTimer: world.spawnTimer,
    },
    players: [...world.players.values()].sort((a, b) => a.slot - b.slot).map((player) => ({ ...player })),
    entities,
  }
}

/**
 * Build a world that continues exactly from a snapshot.
 */
export function restoreWorld(snapshot: WorldSnapshot, config: SimConfig = DEFAULT_SIM_CONFIG): GameWorld {
  const world = createGameWorld(0, config)
  world.tick = snapshot.tick
  world.nextEntityId = snapshot.meta.nextEntityId
  world.rng.reset(snapshot.meta.rngState)
  world.spawnTimer = snapshot.meta.spawnTimer
  for (const player of snapshot.players) {
    world.players.set(player.playerId, { ...player })
  }
  for (const entity of snapshot.entities) {
    switch (entity.kind) {
      case 'ship':
        world.ships.set(entity.id, { ...entity })
        break
      case 'asteroid':
        world.asteroids.set(entity.id, { ...entity })
        break
      case 'projectile':
        world.projectiles.set(entity.id, { ...entity })
        break
    }
  }
  return world
}

// ============================================================================
// Delta compute / apply
// ============================================================================

/**
 * Difference between two snapshots of the same client's view.
 *
 * @param stillExists - Whether an entity missing from `next` is still alive
 *   in the world (left the interest set) rather than despawned
 */
export function computeDelta(
  base: WorldSnapshot,
  next: WorldSnapshot,
  stillExists: (id: EntityId) => boolean = () => false
): SnapshotDelta {
  const baseById = new Map(base.entities.map((entity) => [entity.id, entity]))
  const nextIds = new Set<EntityId>()
  const created: Entity[] = []
  const updated: EntityUpdate[] = []

  for (const entity of next.entities) {
    nextIds.add(entity.id)
    const previous = baseById.get(entity.id)
    if (!previous || previous.kind !== entity.kind) {
      created.push(copyEntity(entity))
      continue
    }
    const before = entityFields(previous)
    const after = entityFields(entity)
    let mask = 0
    const values: number[] = []
    for (let i = 0; i < after.length; i++) {
      if (after[i] !== before[i]) {
        mask |= 1 << i
        values.push(after[i])
      }
    }
    if (mask !== 0) updated.push({ id: entity.id, mask, values })
  }

  const removed: EntityRemoval[] = []
  for (const entity of base.entities) {
    if (nextIds.has(entity.id)) continue
    removed.push({
      id: entity.id,
      reason: stillExists(entity.id) ? RemovalReason.OutOfInterest : RemovalReason.Despawned,
    })
  }

  return {
    tick: next.tick,
    baseTick: base.tick,
    meta: { ...next.meta },
    players: next.players.map((player) => ({ ...player })),
    created,
    updated,
    removed,
  }
}

/**
 * Rebuild the full snapshot a delta describes.
 *
 * @throws ProtocolError if the delta does not fit the base
 */
export function applyDelta(base: WorldSnapshot, delta: SnapshotDelta): WorldSnapshot {
  if (delta.baseTick !== base.tick) {
    throw new ProtocolError(`Delta base tick ${delta.baseTick} does not match snapshot tick ${base.tick}`)
  }

  const entities = new Map<EntityId, Entity>()
  for (const entity of base.entities) entities.set(entity.id, entity)

  for (const removal of delta.removed) {
    if (!entities.delete(removal.id)) {
      throw new ProtocolError(`Delta removes unknown entity ${removal.id}`)
    }
  }

  for (const update of delta.updated) {
    const previous = entities.get(update.id)
    if (!previous) {
      throw new ProtocolError(`Delta updates unknown entity ${update.id}`)
    }
    const fields = entityFields(previous)
    if (update.mask >>> fields.length !== 0) {
      throw new ProtocolError(`Field mask ${update.mask} out of range for ${previous.kind} ${update.id}`)
    }
    let next = 0
    for (let i = 0; i < fields.length; i++) {
      if ((update.mask & (1 << i)) === 0) continue
      if (next >= update.values.length) {
        throw new ProtocolError(`Field mask ${update.mask} has more bits than values for entity ${update.id}`)
      }
      fields[i] = update.values[next++]
    }
    entities.set(update.id, toEntity(previous.kind, update.id, fields))
  }

  for (const entity of delta.created) {
    entities.set(entity.id, copyEntity(entity))
  }

  return {
    tick: delta.tick,
    meta: { ...delta.meta },
    players: delta.players.map((player) => ({ ...player })),
    entities: [...entities.values()].sort((a, b) => a.id - b.id).map(copyEntity),
  }
}

function toEntity(kind: EntityKind, id: EntityId, fields: readonly number[]): Entity {
  try {
    return entityFromFields(kind, id, fields)
  } catch (error) {
    throw new ProtocolError(`Bad ${kind} record ${id}: ${error instanceof Error ? error.message : String(error)}`)
  }
}

// ============================================================================
// Encoder
// ============================================================================

function writeMeta(writer: BinaryWriter, meta: WorldMeta): void {
  writer.u32(meta.nextEntityId).i32(meta.rngState).u32(meta.spawnTimer)
}

function writePlayers(writer: BinaryWriter, players: readonly PlayerRecord[]): void {
  writer.u8(players.length)
  for (const player of players) {
    writer.string(player.playerId).u8(player.slot).u32(player.shipId).i32(player.score)
  }
}

function writeEntity(writer: BinaryWriter, entity: Entity): void {
  writer.u8(ENTITY_KIND_CODE[entity.kind]).u32(entity.id)
  for (const field of entityFields(entity)) writer.i32(field)
}

function writeEntities(writer: BinaryWriter, entities: readonly Entity[]): void {
  writer.u16(entities.length)
  for (const entity of entities) writeEntity(writer, entity)
}

export function encodeFullSnapshot(seq: number, snapshot: WorldSnapshot): Uint8Array {
  const writer = new BinaryWriter()
  writeEnvelope(writer, MessageKind.FullSnapshot, seq, snapshot.tick)
  writeMeta(writer, snapshot.meta)
  writePlayers(writer, snapshot.players)
  writeEntities(writer, snapshot.entities)
  return writer.finish()
}

export function encodeDeltaSnapshot(seq: number, delta: SnapshotDelta): Uint8Array {
  const writer = new BinaryWriter()
  writeEnvelope(writer, MessageKind.DeltaSnapshot, seq, delta.tick)
  writer.u32(delta.baseTick)
  writeMeta(writer, delta.meta)
  writePlayers(writer, delta.players)
  writeEntities(writer, delta.created)

  writer.u16(delta.updated.length)
  for (const update of delta.updated) {
    writer.u32(update.id).u16(update.mask)
    for (const value of update.values) writer.i32(value)
  }

  writer.u16(delta.removed.length)
  for (const removal of delta.removed) {
    writer.u32(removal.id).u8(removal.reason)
  }
  return writer.finish()
}

// ============================================================================
// Decoder
// ============================================================================

function readMeta(reader: BinaryReader): WorldMeta {
  return {
    nextEntityId: reader.u32('nextEntityId'),
    rngState: reader.i32('rngState'),
    spawnTimer: reader.u32('spawnTimer'),
  }
}

function readPlayers(reader: BinaryReader): PlayerRecord[] {
  const count = reader.u8('player count')
  const players: PlayerRecord[] = []
  for (let i = 0; i < count; i++) {
    players.push({
      playerId: reader.string('playerId'),
      slot: reader.u8('slot'),
      shipId: reader.u32('shipId'),
      score: reader.i32('score'),
    })
  }
  return players
}

function readEntity(reader: BinaryReader): Entity {
  const code = reader.u8('entity kind')
  const kind = entityKindFromCode(code)
  if (kind === undefined) throw new ProtocolError(`Unknown entity kind code: ${code}`)
  const id = reader.u32('entity id')
  const fields: number[] = []
  for (let i = 0; i < ENTITY_FIELDS[kind].length; i++) {
    fields.push(reader.i32(`${kind} field`))
  }
  return toEntity(kind, id, fields)
}

function readEntities(reader: BinaryReader): Entity[] {
  const count = reader.u16('entity count')
  const entities: Entity[] = []
  for (let i = 0; i < count; i++) entities.push(readEntity(reader))
  return entities
}

function popcount16(mask: number): number {
  let count = 0
  for (let bits = mask; bits !== 0; bits &= bits - 1) count++
  return count
}

/** Full snapshot payload (envelope already read) */
export function readFullSnapshot(reader: BinaryReader, tick: number): WorldSnapshot {
  const meta = readMeta(reader)
  const players = readPlayers(reader)
  const entities = readEntities(reader)
  return { tick, meta, players, entities }
}

/** Delta snapshot payload (envelope already read) */
export function readDeltaSnapshot(reader: BinaryReader, tick: number): SnapshotDelta {
  const baseTick = reader.u32('baseTick')
  if (baseTick >= tick) {
    throw new ProtocolError(`Delta base tick ${baseTick} is not before tick ${tick}`)
  }
  const meta = readMeta(reader)
  const players = readPlayers(reader)
  const created = readEntities(reader)

  const updatedCount = reader.u16('updated count')
  const updated: EntityUpdate[] = []
  for (let i = 0; i < updatedCount; i++) {
    const id = reader.u32('update id')
    const mask = reader.u16('update mask')
    const values: number[] = []
    for (let bit = popcount16(mask); bit > 0; bit--) values.push(reader.i32('update value'))
    updated.push({ id, mask, values })
  }

  const removedCount = reader.u16('removed count')
  const removed: EntityRemoval[] = []
  for (let i = 0; i < removedCount; i++) {
    const id = reader.u32('removed id')
    const reason = reader.u8('removal reason')
    if (!isRemovalReason(reason)) {
      throw new ProtocolError(`Unknown removal reason: ${reason}`)
    }
    removed.push({ id, reason })
  }

  return { tick, baseTick, meta, players, created, updated, removed }
}

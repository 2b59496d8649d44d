/**
 * World State
 *
 * The world is an explicit arena: one map per entity variant, keyed by
 * EntityId, plus the match-level state the systems need (tick, RNG, spawn
 * timer, players). Everything needed to continue the simulation lives here,
 * so cloning the world is enough to fork it for prediction.
 */

import { SeededRng } from '../math/rng'
import { toFixed, type Fixed } from '../math/fixed'
import type { InputState } from '../net/input'
import type { SpatialHash } from './SpatialHash'
import type { GameEvent } from './events'
import { type SimConfig, DEFAULT_SIM_CONFIG, maxEntityRadius } from './config'
import type { Asteroid, Entity, EntityId, Projectile, Ship } from './entities'

/**
 * Config values converted to fixed-point once per world.
 */
export interface SimConstants {
  width: Fixed
  height: Fixed
  cellSize: Fixed
  shipRadius: Fixed
  projectileRadius: Fixed
  largeAsteroidRadius: Fixed
  smallAsteroidRadius: Fixed
  maxRadius: Fixed
  shipThrust: Fixed
  maxShipSpeed: Fixed
  projectileSpeed: Fixed
  maxAsteroidSpeed: Fixed
  splitSpeed: Fixed
}

export function deriveConstants(config: SimConfig): SimConstants {
  return {
    width: toFixed(config.worldWidth),
    height: toFixed(config.worldHeight),
    cellSize: toFixed(config.cellSize),
    shipRadius: toFixed(config.shipRadius),
    projectileRadius: toFixed(config.projectileRadius),
    largeAsteroidRadius: toFixed(config.largeAsteroidRadius),
    smallAsteroidRadius: toFixed(config.smallAsteroidRadius),
    maxRadius: toFixed(maxEntityRadius(config)),
    shipThrust: toFixed(config.shipThrust),
    maxShipSpeed: toFixed(config.maxShipSpeed),
    projectileSpeed: toFixed(config.projectileSpeed),
    maxAsteroidSpeed: toFixed(config.maxAsteroidSpeed),
    splitSpeed: toFixed(config.splitSpeed),
  }
}

/**
 * A participant in the match. Keyed by playerId (e.g. a session ID).
 */
export interface PlayerRecord {
  playerId: string
  slot: number
  /** Current ship, or NO_ENTITY once destroyed */
  shipId: EntityId
  score: number
}

export interface GameWorld {
  /** Number of ticks advanced so far */
  tick: number
  config: Readonly<SimConfig>
  constants: Readonly<SimConstants>
  initialSeed: number
  rng: SeededRng
  /** Next EntityId to hand out; ids start at 1 */
  nextEntityId: EntityId
  /** Ticks until the next asteroid spawn */
  spawnTimer: number

  ships: Map<EntityId, Ship>
  asteroids: Map<EntityId, Asteroid>
  projectiles: Map<EntityId, Projectile>

  players: Map<string, PlayerRecord>

  /** Fresh inputs for the tick about to be advanced, keyed by ship id. Consumed by the step. */
  inputs: Map<EntityId, InputState>
  /** Events emitted by the most recent tick */
  events: GameEvent[]

  /** Broad-phase scratch structure, rebuilt every tick. Never cloned. */
  spatialHash: SpatialHash | null
}

/**
 * Create a new, empty game world.
 */
export function createGameWorld(seed: number, config: SimConfig = DEFAULT_SIM_CONFIG): GameWorld {
  return {
    tick: 0,
    config,
    constants: deriveConstants(config),
    initialSeed: seed,
    rng: new SeededRng(seed),
    nextEntityId: 1,
    spawnTimer: config.asteroidSpawnIntervalTicks,
    ships: new Map(),
    asteroids: new Map(),
    projectiles: new Map(),
    players: new Map(),
    inputs: new Map(),
    events: [],
    spatialHash: null,
  }
}

function cloneMap<K, V extends object>(source: Map<K, V>): Map<K, V> {
  const out = new Map<K, V>()
  for (const [key, value] of source) {
    out.set(key, { ...value })
  }
  return out
}

/**
 * Deep copy of everything the simulation reads or writes. The copy shares
 * nothing mutable with the source.
 */
export function cloneWorld(world: GameWorld): GameWorld {
  return {
    tick: world.tick,
    config: world.config,
    constants: world.constants,
    initialSeed: world.initialSeed,
    rng: world.rng.clone(),
    nextEntityId: world.nextEntityId,
    spawnTimer: world.spawnTimer,
    ships: cloneMap(world.ships),
    asteroids: cloneMap(world.asteroids),
    projectiles: cloneMap(world.projectiles),
    players: cloneMap(world.players),
    inputs: cloneMap(world.inputs),
    events: world.events.map((event) => ({ ...event })),
    spatialHash: null,
  }
}

/** Hand out the next EntityId */
export function allocateEntityId(world: GameWorld): EntityId {
  const id = world.nextEntityId
  world.nextEntityId++
  return id
}

/** Look up an entity of any variant */
export function getEntity(world: GameWorld, id: EntityId): Entity | undefined {
  return world.ships.get(id) ?? world.asteroids.get(id) ?? world.projectiles.get(id)
}

/**
 * Every entity, ascending by EntityId. Systems that touch more than one
 * variant iterate this so their order never depends on map insertion.
 */
export function sortedEntities(world: GameWorld): Entity[] {
  const all: Entity[] = [...world.ships.values(), ...world.asteroids.values(), ...world.projectiles.values()]
  all.sort((a, b) => a.id - b.id)
  return all
}

/** Values of a map ascending by key */
export function sortedValues<T extends { id: EntityId }>(map: Map<EntityId, T>): T[] {
  return [...map.values()].sort((a, b) => a.id - b.id)
}

/** Find the player who owns a slot */
export function getPlayerBySlot(world: GameWorld, slot: number): PlayerRecord | undefined {
  for (const player of world.players.values()) {
    if (player.slot === slot) return player
  }
  return undefined
}

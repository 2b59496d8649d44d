import { beforeEach, describe, expect, test } from 'vitest'
import { collisionSystem, findCollisionPairs, resolveCollisionPairs, sortCollisionPairs, type CollisionPair } from './collision'
import { createGameWorld, cloneWorld, type GameWorld } from '../world'
import { resolveSimConfig } from '../config'
import { spawnAsteroid, spawnShip } from '../prefabs'
import { hashWorld } from '../hash'
import { toFixed } from '../../math/fixed'
import { SeededRng } from '../../math/rng'
import type { Projectile } from '../entities'

function newWorld(): GameWorld {
  const world = createGameWorld(1, resolveSimConfig({ asteroidSpawnIntervalTicks: 0 }))
  world.players.set('p0', { playerId: 'p0', slot: 0, shipId: 0, score: 0 })
  return world
}

function smallAsteroid(world: GameWorld, x: number, y: number, graceTicks = 0) {
  return spawnAsteroid(world, { size: 'small', x: toFixed(x), y: toFixed(y), vx: 0, vy: 0, heading: 0, graceTicks })
}

/** A projectile placed directly, owned by a ship id that need not exist */
function placeProjectile(world: GameWorld, x: number, y: number, ownerId: number, ownerSlot = 1): Projectile {
  const projectile: Projectile = {
    kind: 'projectile',
    id: world.nextEntityId++,
    x: toFixed(x),
    y: toFixed(y),
    vx: 0,
    vy: 0,
    heading: 0,
    radius: world.constants.projectileRadius,
    health: 1,
    ownerId,
    ownerSlot,
    ttl: 10,
    wrapsRemaining: 1,
  }
  world.projectiles.set(projectile.id, projectile)
  return projectile
}

/**
 * Ship 1 between asteroids 2 (right) and 3 (left); projectile 4 overlaps
 * both the ship and asteroid 2 but sits exactly one radius-sum from 3.
 */
function crowdedWorld(): GameWorld {
  const world = newWorld()
  spawnShip(world, 0, toFixed(500), toFixed(500), 0)
  smallAsteroid(world, 510, 500)
  smallAsteroid(world, 490, 500)
  placeProjectile(world, 520, 500, 99)
  world.events = []
  return world
}

function shuffled<T>(items: readonly T[], seed: number): T[] {
  const rng = new SeededRng(seed)
  const out = [...items]
  for (let i = out.length - 1; i > 0; i--) {
    const j = rng.nextInt(i + 1)
    const tmp = out[i]
    out[i] = out[j]
    out[j] = tmp
  }
  return out
}

describe('collision', () => {
  let world: GameWorld

  beforeEach(() => {
    world = crowdedWorld()
  })

  test('finds exactly the overlapping, interacting pairs', () => {
    expect(sortCollisionPairs(findCollisionPairs(world))).toEqual([
      [1, 2],
      [1, 3],
      [1, 4],
      [2, 4],
    ])
  })

  test('sortCollisionPairs orders by (min id, max id)', () => {
    const pairs: CollisionPair[] = [
      [4, 2],
      [3, 1],
      [2, 1],
    ]
    expect(sortCollisionPairs(pairs)).toEqual([
      [1, 2],
      [1, 3],
      [2, 4],
    ])
  })

  test('resolves pairs in id order, skipping pairs whose members already died', () => {
    collisionSystem(world)
    expect(world.events).toEqual([
      { type: 'damage', tick: 0, entityId: 2, sourceId: 1, amount: 1, remaining: 0 },
      { type: 'despawn', tick: 0, entityId: 2, kind: 'asteroid', reason: 'destroyed' },
      { type: 'damage', tick: 0, entityId: 1, sourceId: 2, amount: 1, remaining: 2 },
      { type: 'damage', tick: 0, entityId: 3, sourceId: 1, amount: 1, remaining: 0 },
      { type: 'despawn', tick: 0, entityId: 3, kind: 'asteroid', reason: 'destroyed' },
      { type: 'despawn', tick: 0, entityId: 4, kind: 'projectile', reason: 'impact' },
    ])
    // Grace from the first hit absorbed the second asteroid and the projectile
    expect(world.ships.get(1)?.health).toBe(2)
    expect(world.ships.get(1)?.graceTicks).toBe(64)
  })

  test('outcome is invariant under permutation of candidate pairs', () => {
    const pairs = findCollisionPairs(world)
    const reference = cloneWorld(world)
    resolveCollisionPairs(reference, pairs)

    for (let seed = 1; seed <= 10; seed++) {
      const candidate = cloneWorld(world)
      const flipped = shuffled(pairs, seed).map((p, i): CollisionPair => (i % 2 === 0 ? [p[1], p[0]] : p))
      resolveCollisionPairs(candidate, flipped)
      expect(hashWorld(candidate)).toBe(hashWorld(reference))
      expect(candidate.events).toEqual(reference.events)
    }
  })

  test('a projectile never hits the ship that fired it', () => {
    const w = newWorld()
    const ship = spawnShip(w, 0, toFixed(300), toFixed(300), 0)
    placeProjectile(w, 305, 300, ship.id, 0)
    expect(findCollisionPairs(w)).toEqual([])
  })

  test('asteroids in spawn grace do not collide', () => {
    const w = newWorld()
    spawnShip(w, 0, toFixed(300), toFixed(300), 0)
    smallAsteroid(w, 305, 300, 10)
    expect(findCollisionPairs(w)).toEqual([])
  })

  test('collisions are detected across the world edge', () => {
    const w = newWorld()
    spawnShip(w, 0, toFixed(5), toFixed(300), 0)
    smallAsteroid(w, 1910, 300)
    expect(findCollisionPairs(w)).toEqual([[1, 2]])
  })

  test('a ship at zero health is destroyed and its player loses the ship', () => {
    const w = newWorld()
    const ship = spawnShip(w, 0, toFixed(300), toFixed(300), 0)
    ship.health = 1
    w.players.set('p0', { playerId: 'p0', slot: 0, shipId: ship.id, score: 0 })
    smallAsteroid(w, 310, 300)
    w.events = []

    collisionSystem(w)

    expect(w.ships.size).toBe(0)
    expect(w.players.get('p0')?.shipId).toBe(0)
    expect(w.events.at(-1)).toEqual({ type: 'despawn', tick: 0, entityId: 1, kind: 'ship', reason: 'destroyed' })
  })

  test('projectile kills credit the owning slot', () => {
    const w = newWorld()
    smallAsteroid(w, 300, 300)
    placeProjectile(w, 310, 300, 50, 0)
    w.events = []
    collisionSystem(w)
    expect(w.players.get('p0')?.score).toBe(10)
    expect(w.events.at(-1)).toEqual({ type: 'score', tick: 0, slot: 0, points: 10, total: 10 })
  })
})

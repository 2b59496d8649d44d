import { describe, expect, test } from 'vitest'
import { projectileLifetimeSystem } from './projectileLifetime'
import { createGameWorld } from '../world'
import { spawnProjectile, spawnShip } from '../prefabs'
import { toFixed } from '../../math/fixed'

describe('projectileLifetimeSystem', () => {
  test('despawns a projectile when its time-to-live runs out', () => {
    const world = createGameWorld(1)
    const ship = spawnShip(world, 0, toFixed(100), toFixed(100), 0)
    const projectile = spawnProjectile(world, ship)
    projectile.ttl = 2

    world.tick = 5
    world.events = []
    projectileLifetimeSystem(world)
    expect(projectile.ttl).toBe(1)
    expect(world.projectiles.has(projectile.id)).toBe(true)

    world.tick = 6
    projectileLifetimeSystem(world)
    expect(world.projectiles.has(projectile.id)).toBe(false)
    expect(world.events).toEqual([
      { type: 'despawn', tick: 6, entityId: projectile.id, kind: 'projectile', reason: 'expired' },
    ])
  })

  test('leaves ships and asteroids alone', () => {
    const world = createGameWorld(1)
    spawnShip(world, 0, 0, 0, 0)
    for (let i = 0; i < 100; i++) projectileLifetimeSystem(world)
    expect(world.ships.size).toBe(1)
  })
})

/**
 * Ship Control System
 *
 * Applies each ship's input for the tick: turning, thrust (with fuel) and
 * firing. Runs first in the pipeline so the resulting velocity is integrated
 * by the movement system in the same tick.
 *
 * A ship with no fresh input keeps its last input for `inputHoldTicks`,
 * then goes neutral. Server and client prediction both follow this rule, so
 * a lost input packet costs at most a short hold.
 */

import { ANGLE_MASK, fpCos, fpMul, fpSin, idiv, isqrt } from '../../math/fixed'
import { AXIS_STEPS, Button, axisToLevel } from '../../net/input'
import { spawnProjectile } from '../prefabs'
import { sortedValues, type GameWorld } from '../world'
import type { Ship } from '../entities'

function takeInput(world: GameWorld, ship: Ship): void {
  const fresh = world.inputs.get(ship.id)
  if (fresh) {
    ship.thrust = axisToLevel(fresh.thrust, 0, 1)
    ship.turn = axisToLevel(fresh.turn, -1, 1)
    ship.buttons = fresh.buttons & Button.FIRE
    ship.inputAge = 0
  } else if (ship.inputAge < world.config.inputHoldTicks) {
    ship.inputAge++
  } else {
    ship.thrust = 0
    ship.turn = 0
    ship.buttons = 0
  }
}

function steer(world: GameWorld, ship: Ship): void {
  const { config, constants } = world

  if (ship.turn !== 0) {
    ship.heading = (ship.heading + idiv(ship.turn * config.shipTurnRate, AXIS_STEPS)) & ANGLE_MASK
  }

  if (ship.thrust > 0 && ship.fuel >= config.fuelBurnPerTick) {
    const accel = idiv(constants.shipThrust * ship.thrust, AXIS_STEPS)
    ship.vx += fpMul(fpCos(ship.heading), accel)
    ship.vy += fpMul(fpSin(ship.heading), accel)
    ship.fuel -= config.fuelBurnPerTick
  } else if (ship.thrust === 0) {
    ship.fuel = Math.min(config.shipFuel, ship.fuel + config.fuelRegenPerTick)
  }

  // Clamp to max speed
  const max = constants.maxShipSpeed
  const speedSq = ship.vx * ship.vx + ship.vy * ship.vy
  if (speedSq > max * max) {
    const speed = isqrt(speedSq)
    ship.vx = idiv(ship.vx * max, speed)
    ship.vy = idiv(ship.vy * max, speed)
  }
}

function fire(world: GameWorld, ship: Ship): void {
  if (ship.fireCooldown > 0) ship.fireCooldown--
  if ((ship.buttons & Button.FIRE) === 0 || ship.fireCooldown > 0) return
  spawnProjectile(world, ship)
  ship.fireCooldown = world.config.fireCooldownTicks
}

/**
 * Ship control system - consumes world.inputs
 */
export function shipControlSystem(world: GameWorld): void {
  for (const ship of sortedValues(world.ships)) {
    takeInput(world, ship)
    steer(world, ship)
    fire(world, ship)
  }
  world.inputs.clear()
}

/**
 * Fixed Timestep Simulation
 *
 * The simulation runs at a fixed 64Hz tick rate, independent of render frame
 * rate. Systems run in registration order; the order is part of the
 * simulation's contract, so every client and the server register the same
 * pipeline (see systems/index.ts).
 */

import { cloneWorld, type GameWorld } from './world'
import type { InputState } from '../net/input'
import type { EntityId } from './entities'

// ============================================================================
// Constants
// ============================================================================

/** Simulation tick rate (ticks per second) */
export const TICK_RATE = 64

/** Time per tick in seconds */
export const TICK_S = 1 / TICK_RATE

/** Time per tick in milliseconds */
export const TICK_MS = 1000 / TICK_RATE

// ============================================================================
// System Execution
// ============================================================================

/**
 * System function signature. Systems mutate the world in place and must not
 * read anything outside it (no clocks, no Math.random).
 */
export type System = (world: GameWorld) => void

/**
 * Create a new system registry
 * Each game instance should have its own registry to avoid global state
 */
export function createSystemRegistry() {
  const systems: System[] = []

  return {
    /**
     * Register a system to run each tick
     * Systems run in registration order
     */
    register(system: System): void {
      systems.push(system)
    },

    /**
     * Clear all registered systems
     */
    clear(): void {
      systems.length = 0
    },

    /**
     * Get current system count
     */
    count(): number {
      return systems.length
    },

    /**
     * Get all systems (for stepping)
     */
    getSystems(): readonly System[] {
      return systems
    },
  }
}

export type SystemRegistry = ReturnType<typeof createSystemRegistry>

// ============================================================================
// Step Function
// ============================================================================

/**
 * Step the simulation forward by one tick, in place.
 *
 * The tick counter advances first, so systems (and the events they emit) see
 * the number of the tick being produced. The previous tick's events are
 * dropped. Fresh inputs must already be in
 * `world.inputs`; the step consumes them.
 */
export function stepWorld(world: GameWorld, systems: SystemRegistry): void {
  world.tick++
  world.events = []
  for (const system of systems.getSystems()) {
    system(world)
  }
}

/**
 * Pure form of stepWorld: returns the next state and leaves `state` untouched.
 *
 * @param state - World at tick T
 * @param inputs - Fresh inputs for tick T+1, keyed by ship id
 * @param systems - Pipeline to run
 */
export function advance(
  state: GameWorld,
  inputs: ReadonlyMap<EntityId, InputState>,
  systems: SystemRegistry
): GameWorld {
  const next = cloneWorld(state)
  next.inputs.clear()
  for (const [shipId, input] of inputs) {
    next.inputs.set(shipId, { ...input })
  }
  stepWorld(next, systems)
  return next
}

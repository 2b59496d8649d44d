/**
 * Simulation Tuning
 *
 * Every gameplay constant the simulation reads. Client and server must run
 * with the same values; the server ships its resolved config to clients in
 * the `game-config` message.
 *
 * Units: distances in world pixels, speeds in pixels per tick, durations in
 * ticks, angles in 1/1024 turns.
 */

// ============================================================================
// Types
// ============================================================================

export interface SimConfig {
  // World
  worldWidth: number
  worldHeight: number
  /** Spatial index cell size; must divide both world dimensions */
  cellSize: number

  // Ships
  shipRadius: number
  shipHealth: number
  /** Angle units turned per tick at full turn input */
  shipTurnRate: number
  /** Acceleration per tick at full thrust */
  shipThrust: number
  maxShipSpeed: number
  shipFuel: number
  fuelBurnPerTick: number
  fuelRegenPerTick: number
  fireCooldownTicks: number
  /** Damage immunity after a hit */
  shipGraceTicks: number
  /** How long a ship keeps its last input when no fresh one arrives */
  inputHoldTicks: number
  collisionDamage: number

  // Projectiles
  projectileRadius: number
  projectileSpeed: number
  projectileTtlTicks: number
  projectileWraps: number
  projectileDamage: number

  // Asteroids
  largeAsteroidRadius: number
  smallAsteroidRadius: number
  largeAsteroidHealth: number
  smallAsteroidHealth: number
  maxAsteroidSpeed: number
  /** 0 disables the spawner */
  asteroidSpawnIntervalTicks: number
  largeAsteroidChance: number
  asteroidWraps: number
  splitCount: number
  /** Angle units between the parent heading and each child's heading */
  splitAngle: number
  splitSpeed: number
  /** Split children ignore collisions for this long */
  childGraceTicks: number

  // Scoring
  largeAsteroidScore: number
  smallAsteroidScore: number
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SIM_CONFIG: Readonly<SimConfig> = Object.freeze({
  worldWidth: 1920,
  worldHeight: 1080,
  cellSize: 60,

  shipRadius: 15,
  shipHealth: 3,
  shipTurnRate: 10,
  shipThrust: 0.08,
  maxShipSpeed: 5,
  shipFuel: 640,
  fuelBurnPerTick: 2,
  fuelRegenPerTick: 1,
  fireCooldownTicks: 16,
  shipGraceTicks: 64,
  inputHoldTicks: 6,
  collisionDamage: 1,

  projectileRadius: 10,
  projectileSpeed: 8,
  projectileTtlTicks: 64,
  projectileWraps: 1,
  projectileDamage: 1,

  largeAsteroidRadius: 40,
  smallAsteroidRadius: 20,
  largeAsteroidHealth: 1,
  smallAsteroidHealth: 1,
  maxAsteroidSpeed: 3,
  asteroidSpawnIntervalTicks: 64,
  largeAsteroidChance: 0.2,
  asteroidWraps: 5,
  splitCount: 2,
  splitAngle: 128,
  splitSpeed: 1.5,
  childGraceTicks: 64,

  largeAsteroidScore: 25,
  smallAsteroidScore: 10,
})

// ============================================================================
// Validation
// ============================================================================

const POSITIVE_INTEGER_KEYS = [
  'worldWidth',
  'worldHeight',
  'cellSize',
  'shipHealth',
  'shipFuel',
  'splitCount',
] as const satisfies ReadonlyArray<keyof SimConfig>

const NON_NEGATIVE_INTEGER_KEYS = [
  'shipTurnRate',
  'fuelBurnPerTick',
  'fuelRegenPerTick',
  'fireCooldownTicks',
  'shipGraceTicks',
  'inputHoldTicks',
  'collisionDamage',
  'projectileTtlTicks',
  'projectileWraps',
  'projectileDamage',
  'largeAsteroidHealth',
  'smallAsteroidHealth',
  'asteroidSpawnIntervalTicks',
  'asteroidWraps',
  'splitAngle',
  'childGraceTicks',
  'largeAsteroidScore',
  'smallAsteroidScore',
] as const satisfies ReadonlyArray<keyof SimConfig>

const POSITIVE_NUMBER_KEYS = [
  'shipRadius',
  'projectileRadius',
  'largeAsteroidRadius',
  'smallAsteroidRadius',
  'projectileSpeed',
] as const satisfies ReadonlyArray<keyof SimConfig>

const NON_NEGATIVE_NUMBER_KEYS = [
  'shipThrust',
  'maxShipSpeed',
  'maxAsteroidSpeed',
  'splitSpeed',
] as const satisfies ReadonlyArray<keyof SimConfig>

/**
 * Largest world side in pixels. Wrapped distances are at most half a side,
 * so dx² + dy² of two 16.16 positions stays within 2^53.
 */
export const MAX_WORLD_SIZE = 2048

/** Every SimConfig key */
export const SIM_CONFIG_KEYS: ReadonlyArray<keyof SimConfig> = [
  ...POSITIVE_INTEGER_KEYS,
  ...NON_NEGATIVE_INTEGER_KEYS,
  ...POSITIVE_NUMBER_KEYS,
  ...NON_NEGATIVE_NUMBER_KEYS,
  'largeAsteroidChance',
]

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws If any value is out of range
 */
export function resolveSimConfig(overrides: Partial<SimConfig> = {}): SimConfig {
  const config: SimConfig = { ...DEFAULT_SIM_CONFIG, ...overrides }

  for (const key of POSITIVE_INTEGER_KEYS) {
    if (!Number.isInteger(config[key]) || config[key] <= 0) {
      throw new Error(`Invalid sim config: ${key} must be a positive integer, got ${config[key]}`)
    }
  }
  for (const key of NON_NEGATIVE_INTEGER_KEYS) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      throw new Error(`Invalid sim config: ${key} must be a non-negative integer, got ${config[key]}`)
    }
  }
  for (const key of POSITIVE_NUMBER_KEYS) {
    if (!Number.isFinite(config[key]) || config[key] <= 0) {
      throw new Error(`Invalid sim config: ${key} must be positive, got ${config[key]}`)
    }
  }
  for (const key of NON_NEGATIVE_NUMBER_KEYS) {
    if (!Number.isFinite(config[key]) || config[key] < 0) {
      throw new Error(`Invalid sim config: ${key} must be non-negative, got ${config[key]}`)
    }
  }
  if (config.worldWidth > MAX_WORLD_SIZE || config.worldHeight > MAX_WORLD_SIZE) {
    throw new Error(
      `Invalid sim config: world ${config.worldWidth}x${config.worldHeight} exceeds ${MAX_WORLD_SIZE} px per side`
    )
  }
  if (config.worldWidth % config.cellSize !== 0 || config.worldHeight % config.cellSize !== 0) {
    throw new Error(
      `Invalid sim config: cellSize ${config.cellSize} must divide world ${config.worldWidth}x${config.worldHeight}`
    )
  }
  if (config.largeAsteroidChance < 0 || config.largeAsteroidChance > 1) {
    throw new Error(`Invalid sim config: largeAsteroidChance must be in [0, 1], got ${config.largeAsteroidChance}`)
  }

  return config
}

/** Largest collision radius any entity can have under this config */
export function maxEntityRadius(config: SimConfig): number {
  return Math.max(
    config.shipRadius,
    config.projectileRadius,
    config.largeAsteroidRadius,
    config.smallAsteroidRadius
  )
}

/**
 * Validate a config received over the wire. Every key must be present.
 *
 * @throws If a key is missing or a value is out of range
 */
export function parseSimConfig(value: unknown): SimConfig {
  if (typeof value !== 'object' || value === null) {
    throw new Error('Invalid sim config: expected an object')
  }
  const fields: Partial<SimConfig> = {}
  for (const key of SIM_CONFIG_KEYS) {
    const field: unknown = Reflect.get(value, key)
    if (typeof field !== 'number') {
      throw new Error(`Invalid sim config: ${key} must be a number, got ${typeof field}`)
    }
    fields[key] = field
  }
  return resolveSimConfig(fields)
}
